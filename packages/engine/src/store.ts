import type { BatchState, GeneratedBoard, SlotSelector } from './types.js';
import { EngineError, slotOutOfRange } from './errors.js';

export function createState(board: GeneratedBoard): BatchState {
  const cells = board.hazard.length;
  const state: BatchState = {
    n: board.n,
    rows: board.rows,
    columns: board.columns,
    size: board.rows * board.columns,
    hazardCount: board.hazardCount,
    hazard: board.hazard,
    neighborCount: board.neighborCount,
    revealed: new Uint8Array(cells),
    marked: new Uint8Array(cells),
    active: new Uint8Array(board.n),
    won: new Uint8Array(board.n),
    lastRevealed: new Uint8Array(cells),
    lastMarked: new Uint8Array(cells),
  };
  state.active.fill(1);
  return state;
}

/**
 * Clears every mutable field. When a fresh board is given it replaces the
 * current one, and the batch size follows it.
 */
export function resetState(state: BatchState, board?: GeneratedBoard): void {
  if (board) {
    Object.assign(state, createState(board));
    return;
  }
  state.revealed.fill(0);
  state.marked.fill(0);
  state.active.fill(1);
  state.won.fill(0);
  state.lastRevealed.fill(0);
  state.lastMarked.fill(0);
}

export function resolveSlots(selector: SlotSelector, n: number): number[] {
  let slots: number[];
  if (typeof selector === 'number') {
    slots = [selector];
  } else if ('start' in selector) {
    const { start, end } = selector;
    if (!Number.isInteger(start) || !Number.isInteger(end) || start < 0 || end > n || start > end) {
      throw new EngineError(`Slot range [${start}, ${end}) is outside the batch of ${n}`, 'SLOT_OUT_OF_RANGE');
    }
    slots = Array.from({ length: end - start }, (_, i) => start + i);
  } else {
    slots = [...selector];
  }
  for (const slot of slots) {
    if (!Number.isInteger(slot) || slot < 0 || slot >= n) {
      throw slotOutOfRange(slot, n);
    }
  }
  return slots;
}

function pickCells<T extends Uint8Array | Int8Array>(out: T, source: Uint8Array | Int8Array, slots: number[], size: number): T {
  slots.forEach((slot, i) => {
    out.set(source.subarray(slot * size, (slot + 1) * size), i * size);
  });
  return out;
}

/** Copies the chosen slots into a new, independent state. */
export function selectSlots(state: BatchState, selector: SlotSelector): BatchState {
  const slots = resolveSlots(selector, state.n);
  const { size } = state;
  const bytes = (source: Uint8Array) => pickCells(new Uint8Array(slots.length * size), source, slots, size);
  const perSlot = (source: Uint8Array) => Uint8Array.from(slots, (slot) => source[slot]);
  return {
    n: slots.length,
    rows: state.rows,
    columns: state.columns,
    size,
    hazardCount: Int32Array.from(slots, (slot) => state.hazardCount[slot]),
    hazard: bytes(state.hazard),
    neighborCount: pickCells(new Int8Array(slots.length * size), state.neighborCount, slots, size),
    revealed: bytes(state.revealed),
    marked: bytes(state.marked),
    active: perSlot(state.active),
    won: perSlot(state.won),
    lastRevealed: bytes(state.lastRevealed),
    lastMarked: bytes(state.lastMarked),
  };
}

export function activeSlots(state: BatchState): number[] {
  const out: number[] = [];
  for (let slot = 0; slot < state.n; slot++) {
    if (state.active[slot]) out.push(slot);
  }
  return out;
}

/** Recomputes `won` for every slot and deactivates the ones just completed. */
export function settleWins(state: BatchState): void {
  const { size } = state;
  for (let slot = 0; slot < state.n; slot++) {
    const base = slot * size;
    let covered = true;
    for (let i = base; i < base + size; i++) {
      if (!state.revealed[i] && !state.hazard[i]) {
        covered = false;
        break;
      }
    }
    state.won[slot] = covered ? 1 : 0;
    if (covered) state.active[slot] = 0;
  }
}

export function revealCell(state: BatchState, index: number): void {
  state.revealed[index] = 1;
}
