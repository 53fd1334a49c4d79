export * from './types.js';
export { BatchGame } from './game.js';
export type { BatchGameOptions, ResetOptions } from './game.js';
export { GameConfigSchema, defaultConfig, validateConfig, parseConfig } from './config.js';
export type { GameConfig, GameConfigInput } from './config.js';
export { readEnvConfig, loadEnvFile } from './env.js';
export { EngineError } from './errors.js';
export type { EngineErrorCode } from './errors.js';
export { createLogger } from './log.js';
export type { Logger } from './log.js';
export { Rng } from './rng.js';
export {
  HAZARD_SENTINEL,
  NEIGHBOR_OFFSETS,
  generateBoard,
  generateHazards,
  computeNeighborCounts,
  normalizeHazardCounts,
  boardFromHazards,
} from './generator.js';
export { createState, resetState, selectSlots, activeSlots, settleWins } from './store.js';
export { applyMove } from './moves.js';
export { openZero, pickStart } from './cascade.js';
export {
  HIDDEN,
  MARKED,
  EXPORT_CODES,
  gameState,
  scores,
  winRate,
  completedCount,
  losingMoves,
  fatalCells,
  lastMoves,
  exportDataset,
} from './report.js';
export type { StateViewOptions, ScoreOptions } from './report.js';
export { renderFrame } from './render.js';
export { createMask, cellIndex, setCells, maskFromRows } from './masks.js';
