import { z } from 'zod';
import type { LevelWithSilent } from 'pino';

export const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const satisfies readonly LevelWithSilent[];

export const LogLevelSchema = z.enum(LOG_LEVELS);

export type Env = Readonly<Record<string, string | undefined>>;

/**
 * Log level for the root logger. Read without the config guard: the guard itself logs.
 */
export function resolveLogLevel(env: Env): LevelWithSilent {
    const parsed = LogLevelSchema.safeParse(env.PREPRO_LOG_LEVEL);
    return parsed.success ? parsed.data : 'info';
}
