// apps/cli/src/main.ts
//
// Wires configuration, logging, the word source, the stats store and the
// terminal into one session. Returns the process exit code:
//
//   0 → game finished (or input ended) and stats, if any, were saved
//   1 → startup failed, or the stats could not be saved

import { nanoid } from 'nanoid';
import type { DestinationStream } from 'pino';
import { LineAttemptReader } from './attemptReader.js';
import { loadConfig, resolveColor, type CliConfig } from './config.js';
import { StartupError } from './errors.js';
import { createLogger } from './logger.js';
import { runSession } from './session.js';
import { FileStatsStore } from './statsStore.js';
import { loadSecret, loadWordSet } from './wordSource.js';

export type MainIO = {
  env: NodeJS.ProcessEnv;
  stdin: NodeJS.ReadableStream;
  stdout: NodeJS.WritableStream & { isTTY?: boolean };
  stderr: NodeJS.WritableStream;
  /** where pino writes; stderr's file descriptor when omitted */
  logDestination?: DestinationStream;
};

export async function main(io: MainIO): Promise<number> {
  let config: CliConfig;
  try {
    config = loadConfig(io.env);
  } catch (err) {
    if (!(err instanceof StartupError)) throw err;
    io.stderr.write(`${err.message}\n`);
    return 1;
  }

  const log = createLogger(config.logLevel, io.logDestination).child({ session: nanoid(10) });
  const { rules } = config;

  try {
    const words = await loadWordSet(config.wordsFile, rules, log);
    const secret = await loadSecret({ answerFile: config.answerFile, seed: config.seed }, words, log);
    const store = new FileStatsStore(config.statsFile, rules, log);
    const reader = new LineAttemptReader(io.stdin, io.stdout, rules.wordSize);

    try {
      const result = await runSession({ secret, words }, store, {
        reader,
        stdout: io.stdout,
        stderr: io.stderr,
        color: resolveColor(config, io.env, io.stdout.isTTY),
        log,
      });
      return result.persistence === 'failed' ? 1 : 0;
    } finally {
      reader.close();
    }
  } catch (err) {
    if (!(err instanceof StartupError)) throw err;
    log.fatal({ err }, err.message);
    io.stderr.write(`${err.message}\n`);
    return 1;
  }
}
