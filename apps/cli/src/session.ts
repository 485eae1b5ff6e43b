// apps/cli/src/session.ts
//
// One game, start to finish.
//
//   playGame   → the attempt loop: read, validate, score, print
//   runSession → load stats, play, record the outcome, save, print the report
//
// Policy decisions that live here rather than in game-core:
//   • an invalid attempt still uses up its attempt number
//   • end of input (or a failed read) aborts the game; aborted games are
//     never recorded
//   • a failed save is reported and flagged, and the in-memory stats are
//     still shown

import {
  recordOutcome,
  scoreGuess,
  summarize,
  validateAttempt,
  verdictKey,
  type FeedbackResult,
  type PlayerStats,
  type WordSet,
} from '@guesswork/game-core';
import type { AttemptReader } from './attemptReader.js';
import type { Logger } from './logger.js';
import {
  renderAttempt,
  renderLoss,
  renderSummary,
  renderValidationError,
  renderWin,
} from './render.js';
import type { StatsStore } from './statsStore.js';

export type AttemptRecord = {
  /** 1-based */
  index: number;
  guess: string;
  feedback: FeedbackResult;
};

export type GameOutcome =
  | { status: 'won'; attempts: number; history: AttemptRecord[] }
  | { status: 'lost'; history: AttemptRecord[] }
  | { status: 'aborted'; history: AttemptRecord[] };

export type GameIO = {
  reader: AttemptReader;
  stdout: NodeJS.WritableStream;
  stderr: NodeJS.WritableStream;
  color: boolean;
  log: Logger;
};

export type GameSetup = {
  secret: string;
  words: WordSet;
};

export async function playGame({ secret, words }: GameSetup, io: GameIO): Promise<GameOutcome> {
  const { rules } = words;
  const history: AttemptRecord[] = [];

  for (let index = 1; index <= rules.maxAttempts; index++) {
    let raw: string | null;
    try {
      raw = await io.reader.read(index);
    } catch (err) {
      io.log.warn({ err, attempt: index }, 'reading attempt failed; game aborted');
      io.stdout.write('\n');
      return { status: 'aborted', history };
    }
    if (raw === null) {
      io.log.info({ attempt: index }, 'input ended; game aborted');
      io.stdout.write('\n');
      return { status: 'aborted', history };
    }

    const checked = validateAttempt(words, raw);
    if (!checked.success) {
      io.log.info({ attempt: index, code: checked.error.code }, 'invalid attempt');
      io.stderr.write(`${renderValidationError(checked.error)}\n`);
      continue;
    }

    const feedback = scoreGuess(secret, checked.word, rules);
    history.push({ index, guess: checked.word, feedback });
    io.log.debug({ attempt: index, pattern: verdictKey(feedback.verdicts) }, 'attempt scored');
    io.stdout.write(`${renderAttempt(checked.word, feedback, { color: io.color })}\n`);

    if (feedback.solved) {
      io.stdout.write(`${renderWin(index, rules.maxAttempts)}\n`);
      return { status: 'won', attempts: index, history };
    }
  }

  io.stdout.write(`${renderLoss(secret)}\n`);
  return { status: 'lost', history };
}

export type Persistence = 'saved' | 'failed' | 'skipped';

export type SessionResult = {
  outcome: GameOutcome;
  stats: PlayerStats;
  persistence: Persistence;
};

/**
 * runSession plays one game against `store`. Load errors propagate; save
 * errors are caught, logged, printed and returned as persistence "failed".
 */
export async function runSession(
  setup: GameSetup,
  store: StatsStore,
  io: GameIO,
): Promise<SessionResult> {
  const loaded = await store.load();
  io.log.info({ status: loaded.status }, 'stats loaded');

  const outcome = await playGame(setup, io);
  if (outcome.status === 'aborted') {
    return { outcome, stats: loaded.stats, persistence: 'skipped' };
  }

  const stats = recordOutcome(
    loaded.stats,
    outcome.status === 'won' ? outcome.attempts : undefined,
    setup.words.rules,
  );
  io.log.info({ status: outcome.status, scored: outcome.history.length }, 'outcome recorded');

  let persistence: Persistence = 'saved';
  try {
    await store.save(stats);
  } catch (err) {
    persistence = 'failed';
    io.log.error({ err }, 'failed to save stats');
    const reason = err instanceof Error ? err.message : String(err);
    io.stderr.write(`Could not save stats: ${reason}\n`);
  }

  io.stdout.write(`\n${renderSummary(summarize(stats))}\n`);
  return { outcome, stats, persistence };
}
