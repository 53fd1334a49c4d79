import { readFileSync } from 'node:fs';
import { parse } from 'dotenv';
import type { GameConfigInput } from './config.js';
import { EngineError } from './errors.js';

type Env = Record<string, string | undefined>;

const PREFIX = 'BATCHSWEEP_';

function toNumber(name: string, raw: string): number {
  const value = Number(raw.trim());
  if (raw.trim() === '' || !Number.isFinite(value)) {
    throw new EngineError(`Invalid ${PREFIX}${name} value: ${raw}`, 'INVALID_CONFIG');
  }
  return value;
}

/**
 * Picks the engine settings out of an environment map. Only the variables
 * that are present end up in the result, so it can be spread over defaults.
 */
export function readEnvConfig(env: Env = process.env): GameConfigInput {
  const config: GameConfigInput = {};
  const read = (name: string) => {
    const raw = env[`${PREFIX}${name}`];
    return raw === undefined || raw === '' ? undefined : raw;
  };

  const rows = read('ROWS');
  if (rows !== undefined) config.rows = toNumber('ROWS', rows);
  const columns = read('COLUMNS');
  if (columns !== undefined) config.columns = toNumber('COLUMNS', columns);
  const batch = read('BATCH');
  if (batch !== undefined) config.n = toNumber('BATCH', batch);
  const seed = read('SEED');
  if (seed !== undefined) config.seed = toNumber('SEED', seed);

  const hazards = read('HAZARDS');
  if (hazards !== undefined) {
    config.hazards = hazards.includes(',')
      ? hazards.split(',').map((part) => toNumber('HAZARDS', part))
      : toNumber('HAZARDS', hazards);
  }

  const level = read('LOG_LEVEL');
  if (level === 'silent' || level === 'warn' || level === 'info' || level === 'debug') {
    config.logLevel = level;
  } else if (level !== undefined) {
    throw new EngineError(`Invalid ${PREFIX}LOG_LEVEL value: ${level}`, 'INVALID_CONFIG');
  }
  return config;
}

/** Reads a dotenv file without touching `process.env`. */
export function loadEnvFile(path: string): GameConfigInput {
  return readEnvConfig(parse(readFileSync(path)));
}
