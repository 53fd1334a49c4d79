import type { BoardShape, GeneratedBoard, HazardSpec } from './types.js';
import { EngineError, invalidHazardCount, shapeMismatch } from './errors.js';
import type { Rng } from './rng.js';

export const HAZARD_SENTINEL = -1;

export const NEIGHBOR_OFFSETS: ReadonlyArray<readonly [number, number]> = [
  [-1, -1],
  [-1, 0],
  [-1, 1],
  [0, -1],
  [0, 1],
  [1, -1],
  [1, 0],
  [1, 1],
];

export function assertShape({ rows, columns }: BoardShape): void {
  if (!Number.isInteger(rows) || !Number.isInteger(columns) || rows < 1 || columns < 1) {
    throw new EngineError(`Board must be at least 1x1, got ${rows}x${columns}`, 'INVALID_CONFIG');
  }
}

export function assertBatchSize(n: number): void {
  if (!Number.isInteger(n) || n < 0) {
    throw new EngineError(`Batch size must be a non-negative integer, got ${n}`, 'INVALID_CONFIG');
  }
}

/** Expands a scalar-or-array hazard parameter into one validated count per slot. */
export function normalizeHazardCounts(hazards: HazardSpec, n: number, size: number): Int32Array {
  const counts = new Int32Array(n);
  if (typeof hazards === 'number') {
    if (!isValidCount(hazards, size)) {
      throw invalidHazardCount(0, hazards, size);
    }
    return counts.fill(hazards);
  }
  if (hazards.length !== n) {
    throw shapeMismatch('Hazard counts', `${n} (one per slot)`, hazards.length);
  }
  hazards.forEach((count, slot) => {
    if (!isValidCount(count, size)) {
      throw invalidHazardCount(slot, count, size);
    }
    counts[slot] = count;
  });
  return counts;
}

function isValidCount(count: number, size: number): boolean {
  return Number.isInteger(count) && count >= 0 && count <= size;
}

/**
 * Places `counts[slot]` hazards per slot, uniformly and without replacement,
 * using a partial Fisher-Yates shuffle of the cell indices.
 */
export function generateHazards(shape: BoardShape, counts: Int32Array, rng: Rng): Uint8Array {
  const size = shape.rows * shape.columns;
  const hazard = new Uint8Array(counts.length * size);
  const cells = new Int32Array(size);
  for (let slot = 0; slot < counts.length; slot++) {
    for (let i = 0; i < size; i++) cells[i] = i;
    const base = slot * size;
    for (let i = 0; i < counts[slot]; i++) {
      const j = i + rng.int(size - i);
      const picked = cells[j];
      cells[j] = cells[i];
      cells[i] = picked;
      hazard[base + picked] = 1;
    }
  }
  return hazard;
}

/**
 * Sums the eight shifted copies of the hazard grid (off-board neighbours count
 * as zero), then overwrites hazard cells with {@link HAZARD_SENTINEL}.
 */
export function computeNeighborCounts(hazard: Uint8Array, n: number, shape: BoardShape): Int8Array {
  const { rows, columns } = shape;
  const size = rows * columns;
  const counts = new Int8Array(n * size);
  for (const [dr, dc] of NEIGHBOR_OFFSETS) {
    for (let slot = 0; slot < n; slot++) {
      const base = slot * size;
      for (let r = 0; r < rows; r++) {
        const sr = r + dr;
        if (sr < 0 || sr >= rows) continue;
        for (let c = 0; c < columns; c++) {
          const sc = c + dc;
          if (sc < 0 || sc >= columns) continue;
          counts[base + r * columns + c] += hazard[base + sr * columns + sc];
        }
      }
    }
  }
  for (let i = 0; i < hazard.length; i++) {
    if (hazard[i]) counts[i] = HAZARD_SENTINEL;
  }
  return counts;
}

export function generateBoard(shape: BoardShape, hazards: HazardSpec, n: number, rng: Rng): GeneratedBoard {
  assertShape(shape);
  assertBatchSize(n);
  const hazardCount = normalizeHazardCounts(hazards, n, shape.rows * shape.columns);
  const hazard = generateHazards(shape, hazardCount, rng);
  return {
    rows: shape.rows,
    columns: shape.columns,
    n,
    hazardCount,
    hazard,
    neighborCount: computeNeighborCounts(hazard, n, shape),
  };
}

/** Builds a board from a known hazard layout; counts are read off the mask. */
export function boardFromHazards(shape: BoardShape, hazard: Uint8Array): GeneratedBoard {
  assertShape(shape);
  const size = shape.rows * shape.columns;
  if (hazard.length % size !== 0) {
    throw shapeMismatch('Hazard mask', `a multiple of ${size}`, hazard.length);
  }
  const n = hazard.length / size;
  const copy = new Uint8Array(hazard.length);
  const hazardCount = new Int32Array(n);
  for (let i = 0; i < hazard.length; i++) {
    if (hazard[i]) {
      copy[i] = 1;
      hazardCount[Math.floor(i / size)]++;
    }
  }
  return {
    rows: shape.rows,
    columns: shape.columns,
    n,
    hazardCount,
    hazard: copy,
    neighborCount: computeNeighborCounts(copy, n, shape),
  };
}
