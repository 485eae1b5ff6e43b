// apps/cli/src/wordSource.ts
//
// Loads the accepted-guess list and the secret word from disk.
// Every failure here is a StartupError: without both, no game can start.
//
// The secret comes from ANSWER_FILE when one is configured; otherwise it is
// picked from the word list with a seed, today's date unless SEED is set.

import { readFile } from 'node:fs/promises';
import {
  isWellFormedWord,
  parseWordList,
  pickSecret,
  type GameRules,
  type WordSet,
} from '@guesswork/game-core';
import { StartupError } from './errors.js';
import type { Logger } from './logger.js';

async function readText(path: string, what: string): Promise<string> {
  try {
    return await readFile(path, 'utf8');
  } catch (err) {
    throw new StartupError(`Could not read ${what} "${path}"`, { cause: err });
  }
}

/**
 * loadWordSet reads a whitespace-separated list and keeps its well-formed
 * words. Malformed entries are logged and skipped.
 *
 * @throws StartupError when the file is unreadable or yields no words
 */
export async function loadWordSet(path: string, rules: GameRules, log: Logger): Promise<WordSet> {
  const text = await readText(path, 'word list');
  const { words, rejected } = parseWordList(text, rules);
  if (rejected.length > 0) {
    log.warn(
      { path, count: rejected.length, sample: rejected.slice(0, 5) },
      'ignored malformed word list entries',
    );
  }
  if (words.size === 0) {
    throw new StartupError(`Word list "${path}" has no ${rules.wordSize}-letter words`);
  }
  log.info({ path, words: words.size }, 'word list loaded');
  return words;
}

export type SecretSource = {
  answerFile?: string;
  seed?: string;
};

/** Local calendar date as YYYY-MM-DD. */
export function dateKey(now: Date = new Date()): string {
  const pad = (n: number) => String(n).padStart(2, '0');
  return `${now.getFullYear()}-${pad(now.getMonth() + 1)}-${pad(now.getDate())}`;
}

/**
 * loadSecret returns the secret word for this session.
 * From a file, the first whitespace-separated token is used, lowercased.
 *
 * @throws StartupError when the answer file is unreadable, malformed, or
 *         names a word the player is not allowed to guess
 */
export async function loadSecret(
  source: SecretSource,
  words: WordSet,
  log: Logger,
): Promise<string> {
  if (source.answerFile === undefined) {
    const seed = source.seed ?? dateKey();
    log.debug({ seed }, 'secret picked from word list');
    return pickSecret(words.words, seed);
  }

  const text = await readText(source.answerFile, 'answer file');
  const [token = ''] = text.trim().split(/\s+/, 1);
  const secret = token.toLowerCase();
  if (!isWellFormedWord(secret, words.rules)) {
    throw new StartupError(
      `Answer file "${source.answerFile}" does not hold a ${words.rules.wordSize}-letter word`,
    );
  }
  if (!words.has(secret)) {
    throw new StartupError(
      `Answer "${secret}" from "${source.answerFile}" is not in the word list, so it could never be guessed`,
    );
  }
  log.debug({ path: source.answerFile }, 'secret loaded from answer file');
  return secret;
}
