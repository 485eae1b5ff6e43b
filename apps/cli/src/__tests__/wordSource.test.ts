// apps/cli/src/__tests__/wordSource.test.ts
//
// Word list and secret loading from a temporary directory.

import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { createWordSet, DEFAULT_RULES } from '@guesswork/game-core';
import { StartupError } from '../errors';
import { createLogger } from '../logger';
import { dateKey, loadSecret, loadWordSet } from '../wordSource';
import { logMessages, TextSink } from './helpers';

describe('wordSource', () => {
  let dir: string;
  let logSink: TextSink;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'guesswork-words-'));
    logSink = new TextSink();
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  describe('loadWordSet', () => {
    it('loads well-formed words and logs the rest', async () => {
      const path = join(dir, 'words.txt');
      await writeFile(path, 'crane\nSlate\nx-ray\n');

      const words = await loadWordSet(path, DEFAULT_RULES, createLogger('warn', logSink));
      expect([...words.words]).toEqual(['crane', 'slate']);
      expect(logMessages(logSink)).toEqual(['ignored malformed word list entries']);
    });

    it('fails when the file is missing', async () => {
      const path = join(dir, 'nope.txt');
      await expect(loadWordSet(path, DEFAULT_RULES, createLogger('silent', logSink))).rejects.toThrow(
        `Could not read word list "${path}"`,
      );
    });

    it('fails when no word fits the size', async () => {
      const path = join(dir, 'words.txt');
      await writeFile(path, 'four\nsixsix\n');
      await expect(loadWordSet(path, DEFAULT_RULES, createLogger('silent', logSink))).rejects.toThrow(
        'has no 5-letter words',
      );
    });
  });

  describe('loadSecret', () => {
    const words = createWordSet(['slate', 'crane', 'plant', 'bread']);

    it('reads the first token of the answer file', async () => {
      const answerFile = join(dir, 'answer.txt');
      await writeFile(answerFile, '  Bread \n');
      expect(await loadSecret({ answerFile }, words, createLogger('silent', logSink))).toBe('bread');
    });

    it('rejects a malformed answer', async () => {
      const answerFile = join(dir, 'answer.txt');
      await writeFile(answerFile, 'abc\n');
      await expect(
        loadSecret({ answerFile }, words, createLogger('silent', logSink)),
      ).rejects.toBeInstanceOf(StartupError);
    });

    it('rejects an answer the player could not guess', async () => {
      const answerFile = join(dir, 'answer.txt');
      await writeFile(answerFile, 'zesty\n');
      await expect(
        loadSecret({ answerFile }, words, createLogger('silent', logSink)),
      ).rejects.toThrow(`Answer "zesty" from "${answerFile}" is not in the word list`);
    });

    it('picks from the word list with a seed when there is no answer file', async () => {
      const three = createWordSet(['slate', 'crane', 'plant']);
      // seedHash('') % 3 === 1 → [crane, plant, slate][1]
      expect(await loadSecret({ seed: '' }, three, createLogger('silent', logSink))).toBe('plant');
    });
  });

  it('formats the local date as a key', () => {
    expect(dateKey(new Date(2026, 0, 5))).toBe('2026-01-05');
  });
});
