import { describe, expect, it } from 'vitest';
import { BatchGame, NEIGHBOR_OFFSETS, Rng, createState, boardFromHazards, maskFromRows, pickStart } from '../src/index.js';
import { captureError, sum } from './helpers.js';

const CORNER_4X4 = ['x...', '....', '....', '....'];

function cornerGame(): BatchGame {
  const { shape, mask } = maskFromRows([CORNER_4X4]);
  return BatchGame.fromHazards(shape, mask);
}

describe('pickStart', () => {
  it('prefers a zero when there is one', () => {
    const { shape, mask } = maskFromRows([CORNER_4X4]);
    const state = createState(boardFromHazards(shape, mask));
    const rng = new Rng(5);
    for (let i = 0; i < 20; i++) {
      const start = pickStart(state, 0, rng);
      expect(start).not.toBeNull();
      if (start) expect(state.neighborCount[start.row * 4 + start.col]).toBe(0);
    }
  });

  it('falls back to the lowest number and never picks a hazard', () => {
    const { shape, mask } = maskFromRows([['x.', '..']]);
    const state = createState(boardFromHazards(shape, mask));
    const rng = new Rng(8);
    const seen = new Set<string>();
    for (let i = 0; i < 60; i++) {
      const start = pickStart(state, 0, rng);
      expect(start).not.toBeNull();
      if (start) seen.add(`${start.row}:${start.col}`);
    }
    expect(seen.has('0:0')).toBe(false);
    expect([...seen].sort()).toEqual(['0:1', '1:0', '1:1']);
  });

  it('has nothing to offer on a fully mined board', () => {
    const { shape, mask } = maskFromRows([['xx', 'xx']]);
    const state = createState(boardFromHazards(shape, mask));
    expect(pickStart(state, 0, new Rng(1))).toBeNull();
  });
});

describe('BatchGame.openZero', () => {
  it('floods the zero region and its numbered border', () => {
    const game = cornerGame();
    const result = game.openZero([{ row: 3, col: 3 }]);
    expect(sum(result.revealed)).toBe(15);
    expect(result.revealed[0]).toBe(0);
    expect(result.layers).toBe(4);
    expect(result.starts[15]).toBe(1);
    expect(game.view.won[0]).toBe(1);
    expect(game.view.active[0]).toBe(0);
  });

  it('stops at a numbered starting cell', () => {
    const game = cornerGame();
    const result = game.openZero([{ row: 0, col: 1 }]);
    expect(result.layers).toBe(0);
    expect(Array.from(result.revealed)).toEqual([0, 1, 0, 0, 0, 0, 0, 0, 0, 0, 0, 0, 0, 0, 0, 0]);
    expect(game.view.active[0]).toBe(1);
  });

  it('does not spill past a wall of numbers', () => {
    const { shape, mask } = maskFromRows([['..x..', '..x..', '..x..']]);
    const game = BatchGame.fromHazards(shape, mask);
    game.openZero([{ row: 1, col: 0 }]);
    expect(Array.from(game.gameState())).toEqual([0, 2, 9, 9, 9, 0, 3, 9, 9, 9, 0, 2, 9, 9, 9]);
  });

  it('loses a slot whose starting cell is a hazard', () => {
    const game = cornerGame();
    const result = game.openZero([{ row: 0, col: 0 }]);
    expect(sum(result.revealed)).toBe(0);
    expect(result.layers).toBe(0);
    expect(game.view.active[0]).toBe(0);
    expect(Array.from(game.fatalCells(0))[0]).toBe(1);
  });

  it('skips slots that are no longer active', () => {
    const { shape, mask } = maskFromRows([CORNER_4X4, CORNER_4X4]);
    const game = BatchGame.fromHazards(shape, mask);
    const lose = new Uint8Array(32);
    lose[0] = 1;
    expect(game.move(lose)).toEqual([false, true]);
    expect(game.activeSlots()).toEqual([1]);
    const result = game.openZero([
      { row: 3, col: 3 },
      { row: 3, col: 3 },
    ]);
    expect(result.starts[15]).toBe(0);
    expect(sum(result.revealed.subarray(0, 16))).toBe(0);
    expect(sum(result.revealed.subarray(16))).toBe(15);
  });

  it('expands each slot from its own start in one call', () => {
    const { shape, mask } = maskFromRows([CORNER_4X4, ['....', '....', '....', '...x']]);
    const game = BatchGame.fromHazards(shape, mask);
    const result = game.openZero([{ row: 3, col: 3 }, null]);
    expect(sum(result.revealed.subarray(0, 16))).toBe(15);
    expect(sum(result.revealed.subarray(16))).toBe(15);
    expect(game.view.revealed[16 + 15]).toBe(0);
    expect(game.winRate()).toBe(1);
  });

  it('rejects starts that do not match the batch', () => {
    const game = cornerGame();
    expect(captureError(() => game.openZero([])).code).toBe('SHAPE_MISMATCH');
    expect(captureError(() => game.openZero([{ row: 4, col: 0 }])).code).toBe('SHAPE_MISMATCH');
  });

  it('clears an empty 64x64 board within its diameter', () => {
    const game = new BatchGame({ rows: 64, columns: 64, hazards: 0, n: 1, seed: 1 });
    const result = game.openZero([{ row: 0, col: 0 }]);
    expect(result.layers).toBe(64);
    expect(sum(result.revealed)).toBe(64 * 64);
    expect(game.view.won[0]).toBe(1);
  });

  it('never reveals a hazard and leaves no zero unexpanded', () => {
    const rows = 16;
    const columns = 30;
    const game = new BatchGame({ rows, columns, hazards: [10, 40, 99, 200, 479, 480], n: 6, seed: 77 });
    const result = game.openZero();
    const { hazard, revealed, neighborCount } = game.view;
    expect(result.layers).toBeLessThanOrEqual(rows * columns);
    for (let i = 0; i < hazard.length; i++) {
      if (hazard[i]) expect(revealed[i]).toBe(0);
      if (!revealed[i] || neighborCount[i] !== 0) continue;
      const slot = Math.floor(i / (rows * columns));
      const local = i % (rows * columns);
      const row = Math.floor(local / columns);
      const col = local % columns;
      for (const [dr, dc] of NEIGHBOR_OFFSETS) {
        const r = row + dr;
        const c = col + dc;
        if (r < 0 || c < 0 || r >= rows || c >= columns) continue;
        expect(revealed[slot * rows * columns + r * columns + c]).toBe(1);
      }
    }
    // the fully mined slot has no safe opening and wins outright
    expect(sum(result.starts.subarray(5 * rows * columns))).toBe(0);
    expect(game.view.won[5]).toBe(1);
  });
});
