import type {
  BatchState,
  BoardShape,
  CascadeResult,
  CellCoord,
  GeneratedBoard,
  HazardSpec,
  RenderFrame,
  RenderOptions,
  SlotSelector,
} from './types.js';
import { parseConfig, type GameConfig, type GameConfigInput } from './config.js';
import { invalidRate } from './errors.js';
import { boardFromHazards, generateBoard } from './generator.js';
import { createLogger, type Logger } from './log.js';
import { applyMove } from './moves.js';
import { openZero } from './cascade.js';
import { renderFrame } from './render.js';
import {
  completedCount,
  exportDataset,
  fatalCells,
  gameState,
  lastMoves,
  losingMoves,
  scores,
  winRate,
  type ScoreOptions,
  type StateViewOptions,
} from './report.js';
import { Rng } from './rng.js';
import { activeSlots, createState, resetState, selectSlots } from './store.js';

export interface BatchGameOptions {
  /** Generator to draw placements and tie-breaks from; defaults to one seeded from the config. */
  rng?: Rng;
  /** Use this layout instead of generating one. */
  board?: GeneratedBoard;
}

export interface ResetOptions {
  /** Draw a fresh layout. Implied by `n` or `hazards`. */
  regenerate?: boolean;
  n?: number;
  hazards?: HazardSpec;
}

/**
 * A batch of `n` independent games on boards of one shape, advanced together.
 *
 * ```ts
 * const game = new BatchGame({ rows: 9, columns: 9, hazards: 10, n: 256, seed: 7 });
 * game.openZero();
 * const accepted = game.move(reveals, marks);
 * ```
 */
export class BatchGame {
  readonly rng: Rng;
  private config: GameConfig;
  private readonly log: Logger;
  private state: BatchState;

  constructor(config: GameConfigInput = {}, options: BatchGameOptions = {}) {
    this.config = parseConfig(config);
    this.rng = options.rng ?? new Rng(this.config.seed);
    this.log = createLogger('engine', this.config.logLevel);
    this.state = createState(options.board ?? this.generate(this.config.n, this.config.hazards));
  }

  /** Builds a game on a known layout: one `rows * columns` board per slot, 1 marks a hazard. */
  static fromHazards(shape: BoardShape, hazard: Uint8Array, config: GameConfigInput = {}, options: BatchGameOptions = {}): BatchGame {
    const board = boardFromHazards(shape, hazard);
    return new BatchGame(
      { ...config, rows: board.rows, columns: board.columns, n: board.n, hazards: Array.from(board.hazardCount) },
      { ...options, board }
    );
  }

  get n(): number {
    return this.state.n;
  }

  get rows(): number {
    return this.state.rows;
  }

  get columns(): number {
    return this.state.columns;
  }

  get size(): number {
    return this.state.size;
  }

  /** Live view of the batch. Mutate it only through the game's methods. */
  get view(): Readonly<BatchState> {
    return this.state;
  }

  private generate(n: number, hazards: HazardSpec): GeneratedBoard {
    const board = generateBoard({ rows: this.config.rows, columns: this.config.columns }, hazards, n, this.rng);
    this.log.debug('Board generated', { n, rows: board.rows, columns: board.columns });
    return board;
  }

  /**
   * Starts every slot over. Without options the layout is kept; with
   * `regenerate`, `n` or `hazards` a fresh one is drawn.
   */
  reset(options: ResetOptions = {}): void {
    const { regenerate, n, hazards } = options;
    if (!regenerate && n === undefined && hazards === undefined) {
      resetState(this.state);
      this.log.debug('Batch reset', { n: this.state.n });
      return;
    }
    const nextN = n ?? this.state.n;
    const nextHazards = hazards ?? (nextN === this.state.n ? Array.from(this.state.hazardCount) : this.config.hazards);
    const config = parseConfig({ ...this.config, n: nextN, hazards: nextHazards });
    const board = this.generate(config.n, config.hazards);
    this.config = config;
    resetState(this.state, board);
  }

  /** Independent copy of some slots, with its own generator forked from this one. */
  select(selector: SlotSelector): BatchGame {
    const picked = selectSlots(this.state, selector);
    const copy = new BatchGame(
      { ...this.config, n: picked.n, hazards: Array.from(picked.hazardCount) },
      { rng: this.rng.fork(), board: picked }
    );
    copy.state = picked;
    return copy;
  }

  activeSlots(): number[] {
    return activeSlots(this.state);
  }

  move(toReveal?: Uint8Array, toMark?: Uint8Array): boolean[] {
    return applyMove(this.state, toReveal, toMark, this.log);
  }

  openZero(starts?: ReadonlyArray<CellCoord | null | undefined>): CascadeResult {
    return openZero(this.state, this.rng, starts, this.log);
  }

  /** Reveals each safe cell with probability `rate`. Meant for the start of a game. */
  randomOpen(rate: number): Uint8Array {
    const toReveal = this.randomMask(rate, 0);
    this.move(toReveal);
    return toReveal;
  }

  /** Marks each hazard with probability `rate`. Meant for the start of a game. */
  randomMarks(rate: number): Uint8Array {
    const toMark = this.randomMask(rate, 1);
    this.move(undefined, toMark);
    return toMark;
  }

  private randomMask(rate: number, hazardValue: 0 | 1): Uint8Array {
    if (!(rate >= 0 && rate <= 1)) {
      throw invalidRate(rate);
    }
    const { hazard } = this.state;
    const mask = new Uint8Array(hazard.length);
    for (let i = 0; i < mask.length; i++) {
      mask[i] = this.rng.next() < rate && hazard[i] === hazardValue ? 1 : 0;
    }
    return mask;
  }

  gameState(options?: StateViewOptions): Int8Array {
    return gameState(this.state, options);
  }

  scores(options?: ScoreOptions): number[] {
    return scores(this.state, options);
  }

  winRate(): number {
    return winRate(this.state);
  }

  completedCount(): number {
    return completedCount(this.state);
  }

  losingMoves(): Int8Array {
    return losingMoves(this.state);
  }

  fatalCells(slot: number): Uint8Array {
    return fatalCells(this.state, slot);
  }

  lastMoves(slot: number): Int8Array {
    return lastMoves(this.state, slot);
  }

  exportDataset(): Int8Array {
    return exportDataset(this.state);
  }

  renderFrame(slot: number, options?: RenderOptions): RenderFrame {
    return renderFrame(this.state, slot, options);
  }
}
