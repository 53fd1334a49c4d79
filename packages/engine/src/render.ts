import type { BatchState, RenderFrame, RenderOptions } from './types.js';
import { shapeMismatch, slotOutOfRange } from './errors.js';
import { gameState, lastMoves, losingMoves } from './report.js';

/**
 * Read-only snapshot of one slot for an external renderer. With `fullGrid`
 * the state is the neighbour-count grid with -1 on hazards; otherwise it is
 * what the player sees. Probabilities are passed through untouched.
 */
export function renderFrame(state: BatchState, slot: number, options: RenderOptions = {}): RenderFrame {
  if (!Number.isInteger(slot) || slot < 0 || slot >= state.n) {
    throw slotOutOfRange(slot, state.n);
  }
  const { size, rows, columns } = state;
  const begin = slot * size;
  const frame: RenderFrame = {
    slot,
    rows,
    columns,
    state: options.fullGrid
      ? state.neighborCount.slice(begin, begin + size)
      : gameState(state).slice(begin, begin + size),
  };

  if (options.probabilities) {
    if (options.probabilities.length !== size) {
      throw shapeMismatch('Probability overlay', `${size}`, options.probabilities.length);
    }
    frame.probabilities = options.probabilities;
  }

  const { highlighted } = options;
  if (highlighted === 'losing') {
    frame.highlighted = losingMoves(state).slice(begin, begin + size);
  } else if (highlighted === 'last-moves') {
    frame.highlighted = lastMoves(state, slot);
  } else if (highlighted) {
    if (highlighted.length !== size) {
      throw shapeMismatch('Highlight mask', `${size}`, highlighted.length);
    }
    frame.highlighted = Int8Array.from(highlighted);
  }
  return frame;
}
