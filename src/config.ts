import { z } from 'zod';
import { InvalidConfigError } from './errors';
import { formatIssues } from './utils/decode';

export const logLevels = ['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly'] as const;

export type LogLevel = typeof logLevels[number];

const configSchema = z.object({
  NODE_ENV: z.string().min(1).default('development'),
  LOG_LEVEL: z.enum(logLevels).optional(),
});

/**
 * @param nodeEnv runtime environment; `test` silences logging, `local` and `development` log at debug
 * @param logLevel explicit level overriding the environment default
 */
export interface Config {
  nodeEnv: string;
  logLevel: LogLevel | null;
}

export function loadConfig(env: { [name: string]: string | undefined } = process.env): Config {
  const result = configSchema.safeParse({
    NODE_ENV: env.NODE_ENV || undefined,
    LOG_LEVEL: env.LOG_LEVEL || undefined,
  });
  if (!result.success) {
    throw new InvalidConfigError(formatIssues(result.error));
  }
  return Object.freeze({
    nodeEnv: result.data.NODE_ENV,
    logLevel: result.data.LOG_LEVEL ?? null,
  });
}
