import { EngineError } from '../src/index.js';

export function captureError(fn: () => unknown): EngineError {
  try {
    fn();
  } catch (err) {
    if (err instanceof EngineError) {
      return err;
    }
    throw err;
  }
  throw new Error('Expected an EngineError to be thrown');
}

export function sum(values: ArrayLike<number>): number {
  let total = 0;
  for (let i = 0; i < values.length; i++) total += values[i];
  return total;
}

/** Reference neighbour count straight from the definition. */
export function bruteForceCount(hazard: Uint8Array, rows: number, columns: number, slot: number, row: number, col: number): number {
  const base = slot * rows * columns;
  let count = 0;
  for (let dr = -1; dr <= 1; dr++) {
    for (let dc = -1; dc <= 1; dc++) {
      if (dr === 0 && dc === 0) continue;
      const r = row + dr;
      const c = col + dc;
      if (r < 0 || c < 0 || r >= rows || c >= columns) continue;
      count += hazard[base + r * columns + c];
    }
  }
  return count;
}
