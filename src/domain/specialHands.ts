import type { TileCounts } from './counts';
import { countOf, totalCount } from './counts';
import { TERMINALS_AND_HONORS } from './Tile';

/**
 * Seven distinct pairs. A count of 4 (two identical pairs) is rejected; some
 * rule sets accept it as a higher-value variant.
 */
export function isSevenPairs(counts: TileCounts): boolean {
  if (totalCount(counts) !== 14) return false;
  if (counts.size !== 7) return false;
  for (const c of counts.values()) {
    if (c !== 2) return false;
  }
  return true;
}

/** One of each terminal and honor, with exactly one of them doubled. */
export function isThirteenOrphans(counts: TileCounts): boolean {
  if (totalCount(counts) !== 14) return false;

  let singles = 0;
  let pairs = 0;
  for (const o of TERMINALS_AND_HONORS) {
    const c = countOf(counts, o);
    if (c === 1) singles++;
    else if (c === 2) pairs++;
    else return false;
  }
  // any ordinal outside the required set shows up as extra keys
  if (counts.size !== TERMINALS_AND_HONORS.length) return false;
  return singles === 12 && pairs === 1;
}
