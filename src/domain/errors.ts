export type EngineErrorCode = 'InvalidTile' | 'MalformedHand' | 'InvalidArgument';

/**
 * Hard failures of the rules engine. These always point at bad input from the
 * caller; a hand that simply does not win is never an error.
 */
export class EngineError extends Error {
  constructor(readonly code: EngineErrorCode, message: string) {
    super(message);
    this.name = `${code}Error`;
  }
}

export class InvalidTileError extends EngineError {
  constructor(message: string) {
    super('InvalidTile', message);
  }
}

export class MalformedHandError extends EngineError {
  constructor(message: string) {
    super('MalformedHand', message);
  }
}

export class InvalidArgumentError extends EngineError {
  constructor(message: string) {
    super('InvalidArgument', message);
  }
}
