import type { BoardShape, CellCoord } from './types.js';
import { EngineError } from './errors.js';

export function createMask(slots: number, shape: BoardShape): Uint8Array {
  return new Uint8Array(slots * shape.rows * shape.columns);
}

export function cellIndex(shape: BoardShape, slot: number, row: number, col: number): number {
  if (row < 0 || col < 0 || row >= shape.rows || col >= shape.columns) {
    throw new EngineError(`Cell (${row}, ${col}) is off the ${shape.rows}x${shape.columns} board`, 'SHAPE_MISMATCH');
  }
  return slot * shape.rows * shape.columns + row * shape.columns + col;
}

export function setCells(mask: Uint8Array, shape: BoardShape, slot: number, cells: readonly CellCoord[]): Uint8Array {
  for (const { row, col } of cells) {
    const index = cellIndex(shape, slot, row, col);
    if (index >= mask.length) {
      throw new EngineError(`Slot ${slot} does not fit in a mask of ${mask.length} cells`, 'SHAPE_MISMATCH');
    }
    mask[index] = 1;
  }
  return mask;
}

/** Builds a mask from row strings, one board per slot: `x` (or `*`) sets a cell. */
export function maskFromRows(boards: ReadonlyArray<readonly string[]>): { shape: BoardShape; mask: Uint8Array } {
  const rows = boards[0]?.length ?? 0;
  const columns = boards[0]?.[0]?.length ?? 0;
  const shape = { rows, columns };
  const mask = createMask(boards.length, shape);
  boards.forEach((board, slot) => {
    if (board.length !== rows || board.some((line) => line.length !== columns)) {
      throw new EngineError(`Board ${slot} is not ${rows}x${columns}`, 'SHAPE_MISMATCH');
    }
    board.forEach((line, row) => {
      for (let col = 0; col < columns; col++) {
        const ch = line[col];
        if (ch === 'x' || ch === '*') mask[cellIndex(shape, slot, row, col)] = 1;
      }
    });
  });
  return { shape, mask };
}
