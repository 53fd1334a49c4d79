import { z } from 'zod';
import { EngineError } from './errors.js';

const count = z.number().int().nonnegative();

export const GameConfigSchema = z
  .object({
    rows: z.number().int().positive().default(16),
    columns: z.number().int().positive().default(30),
    hazards: z.union([count, z.array(count)]).default(99),
    n: count.default(1),
    seed: z.number().int().nonnegative().max(0xffffffff).optional(),
    logLevel: z.enum(['silent', 'warn', 'info', 'debug']).default('warn'),
  })
  .superRefine((config, ctx) => {
    const size = config.rows * config.columns;
    const counts = typeof config.hazards === 'number' ? [config.hazards] : config.hazards;
    if (Array.isArray(config.hazards) && config.hazards.length !== config.n) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['hazards'],
        message: `expected ${config.n} hazard counts, got ${config.hazards.length}`,
      });
    }
    counts.forEach((value, slot) => {
      if (value > size) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: typeof config.hazards === 'number' ? ['hazards'] : ['hazards', slot],
          message: `${value} hazards do not fit on a ${config.rows}x${config.columns} board`,
        });
      }
    });
  });

export type GameConfigInput = z.input<typeof GameConfigSchema>;
export type GameConfig = z.output<typeof GameConfigSchema>;

export const defaultConfig = (): GameConfig => GameConfigSchema.parse({});

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

export function validateConfig(input: unknown): { ok: true; config: GameConfig } | { ok: false; reason: string } {
  const parsed = GameConfigSchema.safeParse(input);
  if (!parsed.success) {
    return { ok: false, reason: describeIssues(parsed.error) };
  }
  return { ok: true, config: parsed.data };
}

export function parseConfig(input: unknown): GameConfig {
  const parsed = GameConfigSchema.safeParse(input);
  if (!parsed.success) {
    const onlyHazards = parsed.error.issues.every((issue) => issue.path[0] === 'hazards');
    throw new EngineError(
      `Invalid game config: ${describeIssues(parsed.error)}`,
      onlyHazards ? 'INVALID_HAZARD_COUNT' : 'INVALID_CONFIG'
    );
  }
  return parsed.data;
}
