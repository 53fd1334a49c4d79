export type LogLevel = 'silent' | 'warn' | 'info' | 'debug';

/** A hazard count applied to every slot, or one count per slot. */
export type HazardSpec = number | readonly number[];

export interface BoardShape {
  rows: number;
  columns: number;
}

export interface CellCoord {
  row: number;
  col: number;
}

export type SlotSelector = number | readonly number[] | { start: number; end: number };

/**
 * Everything a batch of games knows. Per-cell arrays are flat, slot-major then
 * row-major: `(slot, row, col)` lives at `slot * rows * columns + row * columns + col`.
 */
export interface BatchState extends BoardShape {
  n: number;
  size: number;
  hazardCount: Int32Array;
  hazard: Uint8Array;
  neighborCount: Int8Array;
  revealed: Uint8Array;
  marked: Uint8Array;
  active: Uint8Array;
  won: Uint8Array;
  lastRevealed: Uint8Array;
  lastMarked: Uint8Array;
}

/** Output of the generator; installed into a {@link BatchState} on reset. */
export interface GeneratedBoard extends BoardShape {
  n: number;
  hazardCount: Int32Array;
  hazard: Uint8Array;
  neighborCount: Int8Array;
}

export interface CascadeResult {
  /** Full-batch mask of the cells the cascade started from. */
  starts: Uint8Array;
  /** Full-batch mask of every cell this call revealed, starts included. */
  revealed: Uint8Array;
  /** Number of frontier layers expanded. */
  layers: number;
}

export type Highlight = 'losing' | 'last-moves' | Int8Array | Uint8Array;

export interface RenderOptions {
  fullGrid?: boolean;
  highlighted?: Highlight;
  probabilities?: Float32Array | Float64Array;
}

export interface RenderFrame extends BoardShape {
  slot: number;
  state: Int8Array;
  probabilities?: Float32Array | Float64Array;
  highlighted?: Int8Array;
}
