import { countOrdinals } from '../src/domain/counts';
import { isSevenPairs, isThirteenOrphans } from '../src/domain/specialHands';
import { TERMINALS_AND_HONORS } from '../src/domain/Tile';

describe('isSevenPairs', () => {
  it('accepts seven distinct pairs', () => {
    const tiles = [101, 101, 105, 105, 209, 209, 303, 303, 309, 309, 401, 401, 502, 502];
    expect(isSevenPairs(countOrdinals(tiles))).toBe(true);
  });

  it('rejects four of a kind counted as two pairs', () => {
    const tiles = [101, 101, 101, 101, 105, 105, 209, 209, 303, 303, 401, 401, 502, 502];
    expect(isSevenPairs(countOrdinals(tiles))).toBe(false);
  });

  it('rejects a triplet or a wrong tile count', () => {
    expect(isSevenPairs(countOrdinals([101, 101, 101, 105, 209, 209, 303, 303, 309, 309, 401, 401, 502, 502]))).toBe(false);
    expect(isSevenPairs(countOrdinals([101, 101, 105, 105, 209, 209, 303, 303, 309, 309, 401, 401, 502]))).toBe(false);
  });
});

describe('isThirteenOrphans', () => {
  it('accepts every terminal and honor with one doubled', () => {
    expect(isThirteenOrphans(countOrdinals([...TERMINALS_AND_HONORS, 404]))).toBe(true);
  });

  it('rejects a missing orphan even with fourteen tiles', () => {
    const tiles = [...TERMINALS_AND_HONORS.filter((t) => t !== 503), 101, 109];
    expect(isThirteenOrphans(countOrdinals(tiles))).toBe(false);
  });

  it('rejects a tile outside the set', () => {
    const tiles = [...TERMINALS_AND_HONORS, 105];
    expect(isThirteenOrphans(countOrdinals(tiles))).toBe(false);
  });

  it('rejects an orphan held three times', () => {
    const tiles = [...TERMINALS_AND_HONORS.filter((t) => t !== 503 && t !== 502), 101, 101, 109];
    expect(isThirteenOrphans(countOrdinals(tiles))).toBe(false);
  });
});
