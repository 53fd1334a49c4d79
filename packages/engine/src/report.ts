import type { BatchState } from './types.js';
import { slotOutOfRange } from './errors.js';

export const HIDDEN = 9;
export const MARKED = 10;

/**
 * Codes written by {@link exportDataset}, one signed byte per cell:
 *
 * | code   | meaning                      |
 * |--------|------------------------------|
 * | -1     | hidden hazard                |
 * | 0..8   | revealed, neighbour count    |
 * | 9      | hidden safe cell             |
 * | 10     | marked (always a hazard)     |
 */
export const EXPORT_CODES = {
  hazard: -1,
  hidden: HIDDEN,
  marked: MARKED,
} as const;

export interface StateViewOptions {
  activeOnly?: boolean;
}

export interface ScoreOptions {
  finalOnly?: boolean;
}

function slotsWhere(state: BatchState, keep: (slot: number) => boolean): number[] {
  const out: number[] = [];
  for (let slot = 0; slot < state.n; slot++) {
    if (keep(slot)) out.push(slot);
  }
  return out;
}

/**
 * Player-visible codes per cell: the neighbour count when revealed, otherwise
 * {@link HIDDEN} or {@link MARKED}. Revealed wins over marked; the two never
 * coincide because marks only ever land on hazards.
 */
export function gameState(state: BatchState, options: StateViewOptions = {}): Int8Array {
  const { size } = state;
  const slots = slotsWhere(state, (slot) => !options.activeOnly || state.active[slot] === 1);
  const out = new Int8Array(slots.length * size);
  slots.forEach((slot, k) => {
    const base = slot * size;
    for (let i = 0; i < size; i++) {
      const cell = base + i;
      if (state.revealed[cell]) out[k * size + i] = state.neighborCount[cell];
      else out[k * size + i] = state.marked[cell] ? MARKED : HIDDEN;
    }
  });
  return out;
}

/**
 * Fraction of safe cells revealed per slot. A slot with no safe cells counts
 * as complete (1.0).
 */
export function scores(state: BatchState, options: ScoreOptions = {}): number[] {
  const { size } = state;
  return slotsWhere(state, (slot) => !options.finalOnly || state.active[slot] === 0).map((slot) => {
    const toReveal = size - state.hazardCount[slot];
    if (toReveal === 0) {
      return 1;
    }
    let opened = 0;
    for (let i = slot * size; i < (slot + 1) * size; i++) opened += state.revealed[i];
    return opened / toReveal;
  });
}

export function completedCount(state: BatchState): number {
  let count = 0;
  for (let slot = 0; slot < state.n; slot++) {
    if (!state.active[slot]) count++;
  }
  return count;
}

/** Won over completed slots. `NaN` while nothing has completed. */
export function winRate(state: BatchState): number {
  const completed = completedCount(state);
  if (completed === 0) {
    return Number.NaN;
  }
  let won = 0;
  for (let slot = 0; slot < state.n; slot++) won += state.won[slot];
  return won / completed;
}

/** Full batch, signed: +1 a mark on a safe cell, -1 a reveal on a hazard, from the last move. */
export function losingMoves(state: BatchState): Int8Array {
  const out = new Int8Array(state.hazard.length);
  for (let i = 0; i < out.length; i++) {
    out[i] = state.lastMarked[i] * (1 - state.hazard[i]) - state.lastRevealed[i] * state.hazard[i];
  }
  return out;
}

function assertSlot(state: BatchState, slot: number): void {
  if (!Number.isInteger(slot) || slot < 0 || slot >= state.n) {
    throw slotOutOfRange(slot, state.n);
  }
}

/** The cells that made the slot's last move wrong, as a single-board mask. */
export function fatalCells(state: BatchState, slot: number): Uint8Array {
  assertSlot(state, slot);
  const { size } = state;
  const base = slot * size;
  const out = new Uint8Array(size);
  for (let i = 0; i < size; i++) {
    const cell = base + i;
    const wrongMark = state.lastMarked[cell] && !state.hazard[cell];
    const wrongReveal = state.lastRevealed[cell] && state.hazard[cell];
    out[i] = wrongMark || wrongReveal ? 1 : 0;
  }
  return out;
}

/** Single board, signed: +1 last marks, -1 last reveals. */
export function lastMoves(state: BatchState, slot: number): Int8Array {
  assertSlot(state, slot);
  const { size } = state;
  const base = slot * size;
  const out = new Int8Array(size);
  for (let i = 0; i < size; i++) {
    out[i] = state.lastMarked[base + i] - state.lastRevealed[base + i];
  }
  return out;
}

export function exportDataset(state: BatchState): Int8Array {
  const out = new Int8Array(state.hazard.length);
  for (let i = 0; i < out.length; i++) {
    if (state.revealed[i]) out[i] = state.neighborCount[i];
    else if (state.marked[i]) out[i] = EXPORT_CODES.marked;
    else out[i] = state.hazard[i] ? EXPORT_CODES.hazard : EXPORT_CODES.hidden;
  }
  return out;
}
