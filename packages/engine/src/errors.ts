export type EngineErrorCode =
  | 'SHAPE_MISMATCH'
  | 'INVALID_HAZARD_COUNT'
  | 'INVALID_CONFIG'
  | 'SLOT_OUT_OF_RANGE'
  | 'INVALID_RATE';

/** Raised for caller contract violations. A losing move is never an error. */
export class EngineError extends Error {
  readonly code: EngineErrorCode;

  constructor(message: string, code: EngineErrorCode) {
    super(message);
    this.name = 'EngineError';
    this.code = code;
  }
}

// Pre-built helpers for common cases

export function shapeMismatch(what: string, expected: string, actual: number): EngineError {
  return new EngineError(`${what} has length ${actual}, expected ${expected}`, 'SHAPE_MISMATCH');
}

export function invalidHazardCount(slot: number, count: number, size: number): EngineError {
  return new EngineError(
    `Hazard count ${count} for slot ${slot} must be an integer in [0, ${size}]`,
    'INVALID_HAZARD_COUNT'
  );
}

export function slotOutOfRange(slot: number, n: number): EngineError {
  return new EngineError(`Slot ${slot} is outside the batch of ${n}`, 'SLOT_OUT_OF_RANGE');
}

export function invalidRate(rate: number): EngineError {
  return new EngineError(`Rate ${rate} must be within [0, 1]`, 'INVALID_RATE');
}
