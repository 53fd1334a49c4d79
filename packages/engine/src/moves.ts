import type { BatchState } from './types.js';
import { shapeMismatch } from './errors.js';
import { activeSlots, settleWins } from './store.js';
import type { Logger } from './log.js';

/**
 * Maps the k-th active slot to where its board starts inside a caller mask.
 * Masks may cover only the slots active at call time, or the whole batch.
 */
function maskLayout(
  name: string,
  mask: Uint8Array | undefined,
  state: BatchState,
  active: number[]
): ((k: number, slot: number) => number) | null {
  if (!mask) {
    return null;
  }
  const { size, n } = state;
  if (mask.length === n * size) {
    return (_k, slot) => slot * size;
  }
  if (mask.length === active.length * size) {
    return (k) => k * size;
  }
  throw shapeMismatch(name, `${active.length * size} (active slots) or ${n * size} (whole batch)`, mask.length);
}

function copyAttempt(target: Uint8Array, base: number, size: number, mask: Uint8Array | undefined, offset: number): void {
  if (!mask || offset < 0) {
    target.fill(0, base, base + size);
    return;
  }
  for (let i = 0; i < size; i++) {
    target[base + i] = mask[offset + i] ? 1 : 0;
  }
}

/**
 * Reveals and marks cells on every active slot. A reveal touching a hazard or
 * a mark touching a safe cell loses the slot and nothing from the attempt is
 * applied. Returns one flag per slot active at call time, in slot order.
 */
export function applyMove(state: BatchState, toReveal?: Uint8Array, toMark?: Uint8Array, log?: Logger): boolean[] {
  const active = activeSlots(state);
  const revealAt = maskLayout('Reveal mask', toReveal, state, active);
  const markAt = maskLayout('Mark mask', toMark, state, active);
  const { size } = state;

  const correct = active.map((slot, k) => {
    const base = slot * size;
    copyAttempt(state.lastRevealed, base, size, toReveal, revealAt ? revealAt(k, slot) : -1);
    copyAttempt(state.lastMarked, base, size, toMark, markAt ? markAt(k, slot) : -1);
    for (let i = base; i < base + size; i++) {
      if (state.lastRevealed[i] && state.hazard[i]) return false;
      if (state.lastMarked[i] && !state.hazard[i]) return false;
    }
    return true;
  });

  active.forEach((slot, k) => {
    if (!correct[k]) {
      state.active[slot] = 0;
      return;
    }
    const base = slot * size;
    for (let i = base; i < base + size; i++) {
      state.revealed[i] |= state.lastRevealed[i];
      state.marked[i] |= state.lastMarked[i];
    }
  });

  settleWins(state);

  if (active.length > 0 && !correct.includes(true)) {
    log?.info('Every active slot lost on this move', { slots: active.length });
  }
  return correct;
}
