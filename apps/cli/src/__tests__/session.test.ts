// apps/cli/src/__tests__/session.test.ts
//
// The attempt loop and the session around it, driven by scripted input and
// an in-memory stats store.

import { createWordSet, DEFAULT_RULES } from '@guesswork/game-core';
import { playGame, runSession, type GameIO } from '../session';
import { MemoryStatsStore, ScriptedReader, silentLogger, TextSink } from './helpers';

const words = createWordSet(['bread', 'erase', 'crane', 'slate', 'blood', 'boron']);
const setup = { secret: 'bread', words };

function makeIO(inputs: Array<string | Error>) {
  const reader = new ScriptedReader(inputs);
  const stdout = new TextSink();
  const stderr = new TextSink();
  const io: GameIO = { reader, stdout, stderr, color: false, log: silentLogger() };
  return { io, reader, stdout, stderr };
}

describe('playGame', () => {
  it('prints feedback and stops at the winning attempt', async () => {
    const { io, reader, stdout } = makeIO(['crane', 'bread', 'slate']);

    const outcome = await playGame(setup, io);

    expect(outcome.status).toBe('won');
    if (outcome.status === 'won') expect(outcome.attempts).toBe(2);
    expect(outcome.history.map((r) => [r.index, r.guess])).toEqual([
      [1, 'crane'],
      [2, 'bread'],
    ]);
    expect(reader.prompts).toEqual([1, 2]);
    expect(stdout.text).toBe(
      'Result:  c [r](a) n (e)\nResult: [b][r][e][a][d]\nYou won! (2/6)\n',
    );
  });

  it('reports invalid attempts and counts them against the limit', async () => {
    const { io, stderr } = makeIO(['cran', 'plant', 'bread']);

    const outcome = await playGame(setup, io);

    expect(outcome).toMatchObject({ status: 'won', attempts: 3 });
    expect(outcome.history).toHaveLength(1);
    expect(stderr.text).toBe("'cran' is not a valid word.\n'plant' is not a valid word.\n");
  });

  it('loses after the last attempt and reveals the word', async () => {
    const { io, stdout } = makeIO(Array<string>(6).fill('slate'));

    const outcome = await playGame(setup, io);

    expect(outcome.status).toBe('lost');
    expect(outcome.history).toHaveLength(6);
    expect(stdout.text.endsWith('You lost. The word was "bread".\n')).toBe(true);
  });

  it('follows the configured attempt limit', async () => {
    const short = { secret: 'bread', words: createWordSet(words.words, { wordSize: 5, maxAttempts: 2 }) };
    const { io, reader } = makeIO(['crane', 'slate', 'bread']);

    const outcome = await playGame(short, io);

    expect(outcome.status).toBe('lost');
    expect(reader.prompts).toEqual([1, 2]);
  });

  it('aborts when the input ends', async () => {
    const { io, reader } = makeIO(['crane']);

    const outcome = await playGame(setup, io);

    expect(outcome.status).toBe('aborted');
    expect(outcome.history).toHaveLength(1);
    expect(reader.prompts).toEqual([1, 2]);
  });

  it('aborts when reading fails', async () => {
    const { io } = makeIO([new Error('stdin closed')]);
    expect((await playGame(setup, io)).status).toBe('aborted');
  });
});

describe('runSession', () => {
  it('records a win, saves it and prints the report', async () => {
    const store = new MemoryStatsStore(DEFAULT_RULES, { wins: [1, 0, 0, 0, 0, 0], losses: 0 });
    const { io, stdout } = makeIO(['bread']);

    const result = await runSession(setup, store, io);

    expect(result.persistence).toBe('saved');
    expect(store.saved).toEqual([{ wins: [2, 0, 0, 0, 0, 0], losses: 0 }]);
    expect(stdout.text).toBe(
      'Result: [b][r][e][a][d]\n' +
        'You won! (1/6)\n' +
        '\n' +
        'Played: 2\n' +
        'Win %: 100.0%\n' +
        '\n' +
        'Guess distribution:\n' +
        '1: ** 2\n' +
        '2: 0\n' +
        '3: 0\n' +
        '4: 0\n' +
        '5: 0\n' +
        '6: 0\n',
    );
  });

  it('records a loss', async () => {
    const store = new MemoryStatsStore(DEFAULT_RULES);
    const { io } = makeIO(Array<string>(6).fill('crane'));

    const result = await runSession(setup, store, io);

    expect(result.stats).toEqual({ wins: [0, 0, 0, 0, 0, 0], losses: 1 });
    expect(store.saved).toEqual([{ wins: [0, 0, 0, 0, 0, 0], losses: 1 }]);
  });

  it('leaves the stats alone when the game is aborted', async () => {
    const store = new MemoryStatsStore(DEFAULT_RULES, { wins: [0, 1, 0, 0, 0, 0], losses: 3 });
    const { io, stdout } = makeIO(['crane']);

    const result = await runSession(setup, store, io);

    expect(result.persistence).toBe('skipped');
    expect(result.stats).toEqual({ wins: [0, 1, 0, 0, 0, 0], losses: 3 });
    expect(store.saved).toEqual([]);
    expect(stdout.text).not.toContain('Played:');
  });

  it('reports a failed save but still shows the updated stats', async () => {
    const store = new MemoryStatsStore(DEFAULT_RULES, undefined, new Error('disk full'));
    const { io, stdout, stderr } = makeIO(['bread']);

    const result = await runSession(setup, store, io);

    expect(result.persistence).toBe('failed');
    expect(result.stats).toEqual({ wins: [1, 0, 0, 0, 0, 0], losses: 0 });
    expect(stderr.text).toBe('Could not save stats: disk full\n');
    expect(stdout.text).toContain('Played: 1\nWin %: 100.0%\n');
  });
});
