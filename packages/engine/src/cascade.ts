import type { BatchState, CascadeResult, CellCoord } from './types.js';
import { EngineError, shapeMismatch } from './errors.js';
import { NEIGHBOR_OFFSETS } from './generator.js';
import { applyMove } from './moves.js';
import { activeSlots, revealCell, settleWins } from './store.js';
import type { Logger } from './log.js';
import type { Rng } from './rng.js';

// Pushes hazards (-1) past every real count (0..8) in the minimum search.
const HAZARD_BIAS = 10;

/**
 * The lowest-numbered safe cell of a slot, ties broken uniformly at random.
 * `null` when the slot has no safe cell at all.
 */
export function pickStart(state: BatchState, slot: number, rng: Rng): CellCoord | null {
  const { size, columns } = state;
  const base = slot * size;
  let min = Infinity;
  let candidates: number[] = [];
  for (let i = 0; i < size; i++) {
    const value = state.neighborCount[base + i] + HAZARD_BIAS * state.hazard[base + i];
    if (value < min) {
      min = value;
      candidates = [i];
    } else if (value === min) {
      candidates.push(i);
    }
  }
  if (min >= HAZARD_BIAS - 1) {
    return null;
  }
  const cell = candidates[rng.int(candidates.length)];
  return { row: Math.floor(cell / columns), col: cell % columns };
}

function expandLayer(state: BatchState, frontier: number[]): number[] {
  const { size, rows, columns } = state;
  const next: number[] = [];
  for (const [dr, dc] of NEIGHBOR_OFFSETS) {
    for (const cell of frontier) {
      const local = cell % size;
      const row = Math.floor(local / columns) + dr;
      const col = (local % columns) + dc;
      if (row < 0 || row >= rows || col < 0 || col >= columns) continue;
      const neighbor = cell - local + row * columns + col;
      if (state.revealed[neighbor]) continue;
      revealCell(state, neighbor);
      if (state.neighborCount[neighbor] === 0) next.push(neighbor);
    }
  }
  return next;
}

/**
 * Opens one starting cell per active slot and floods outward from every zero
 * it reaches, revealing the zero region and its numbered border. Meant for the
 * opening of a game; later calls still work but ignore marks.
 *
 * `starts` is indexed by slot; a missing entry falls back to {@link pickStart}.
 * Starting cells go through {@link applyMove}, so a hazard start loses its slot.
 */
export function openZero(
  state: BatchState,
  rng: Rng,
  starts?: ReadonlyArray<CellCoord | null | undefined>,
  log?: Logger
): CascadeResult {
  const { n, size, rows, columns } = state;
  if (starts && starts.length !== n) {
    throw shapeMismatch('Start cells', `${n} (one per slot)`, starts.length);
  }
  const before = state.revealed.slice();
  const startMask = new Uint8Array(n * size);
  const chosen = new Map<number, number>();

  const active = activeSlots(state);
  for (const slot of active) {
    const start = starts?.[slot] ?? pickStart(state, slot, rng);
    if (!start) continue;
    const { row, col } = start;
    if (!Number.isInteger(row) || !Number.isInteger(col) || row < 0 || row >= rows || col < 0 || col >= columns) {
      throw new EngineError(`Start cell (${row}, ${col}) for slot ${slot} is off the ${rows}x${columns} board`, 'SHAPE_MISMATCH');
    }
    const cell = slot * size + row * columns + col;
    startMask[cell] = 1;
    chosen.set(slot, cell);
  }

  const accepted = applyMove(state, startMask, undefined, log);

  let frontier: number[] = [];
  active.forEach((slot, k) => {
    const cell = chosen.get(slot);
    if (accepted[k] && cell !== undefined && state.neighborCount[cell] === 0) frontier.push(cell);
  });

  let layers = 0;
  while (frontier.length > 0) {
    layers++;
    frontier = expandLayer(state, frontier);
  }

  settleWins(state);

  const revealed = new Uint8Array(n * size);
  for (let i = 0; i < revealed.length; i++) {
    revealed[i] = state.revealed[i] & ~before[i] & 1;
  }
  log?.debug('Cascade finished', { slots: chosen.size, layers });
  return { starts: startMask, revealed, layers };
}
