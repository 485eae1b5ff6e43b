// apps/cli/src/config.ts
//
// Environment-driven configuration. `dotenv/config` (imported by the entry
// point) fills process.env from a .env file first; this module validates the
// result with Zod and turns it into a typed CliConfig.
//
//   WORDS_FILE    accepted guesses, one per line       (words.txt)
//   ANSWER_FILE   secret word; empty → pick from list   (answer.txt)
//   SEED          seed for picking the secret           (today's date)
//   STATS_FILE    persistent stats record               (stats.txt)
//   WORD_SIZE     letters per word, 1–15                (5)
//   MAX_ATTEMPTS  guesses per game, 1–10                (6)
//   COLOR         true/false/1/0                        (auto)
//   LOG_LEVEL     pino level                            (warn)

import { z } from 'zod';
import type { GameRules } from '@guesswork/game-core';
import { ConfigError } from './errors.js';

const logLevelSchema = z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']);
export type LogLevel = z.infer<typeof logLevelSchema>;

const flag = z.enum(['true', 'false', '1', '0']).transform((v) => v === 'true' || v === '1');

export const envSchema = z.object({
  WORDS_FILE: z.string().min(1).default('words.txt'),
  ANSWER_FILE: z
    .string()
    .default('answer.txt')
    .transform((v) => (v.trim() === '' ? undefined : v)),
  SEED: z.string().min(1).optional(),
  STATS_FILE: z.string().min(1).default('stats.txt'),
  WORD_SIZE: z.coerce.number().int().min(1).max(15).default(5),
  MAX_ATTEMPTS: z.coerce.number().int().min(1).max(10).default(6),
  COLOR: flag.optional(),
  LOG_LEVEL: logLevelSchema.default('warn'),
});

export type CliConfig = {
  wordsFile: string;
  answerFile?: string;
  seed?: string;
  statsFile: string;
  rules: GameRules;
  /** undefined → decide from the terminal */
  color?: boolean;
  logLevel: LogLevel;
};

/**
 * loadConfig validates an environment map.
 *
 * @throws ConfigError listing every invalid variable
 */
export function loadConfig(env: NodeJS.ProcessEnv): CliConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
    );
  }
  const e = parsed.data;
  return {
    wordsFile: e.WORDS_FILE,
    answerFile: e.ANSWER_FILE,
    seed: e.SEED,
    statsFile: e.STATS_FILE,
    rules: { wordSize: e.WORD_SIZE, maxAttempts: e.MAX_ATTEMPTS },
    color: e.COLOR,
    logLevel: e.LOG_LEVEL,
  };
}

/**
 * Colors are on when COLOR says so; otherwise only for a TTY without NO_COLOR.
 */
export function resolveColor(
  config: Pick<CliConfig, 'color'>,
  env: NodeJS.ProcessEnv,
  isTTY: boolean | undefined,
): boolean {
  if (config.color !== undefined) return config.color;
  return !env.NO_COLOR && isTTY === true;
}
