// apps/cli/src/render.ts
//
// Text for the terminal. Nothing here writes; callers print the strings.
//
// Letter styles (ANSI):
//   correct → black on green
//   present → yellow on black
//   absent  → white on black
// Without color: [x] correct, (x) present, " x " absent.

import type { FeedbackResult, StatsSummary, ValidationError, Verdict } from '@guesswork/game-core';

const ANSI: Record<Verdict, string> = {
  correct: '\x1b[42;30m',
  present: '\x1b[40;33m',
  absent: '\x1b[40;37m',
};
const RESET = '\x1b[0m';

const PLAIN: Record<Verdict, (letter: string) => string> = {
  correct: (l) => `[${l}]`,
  present: (l) => `(${l})`,
  absent: (l) => ` ${l} `,
};

export type RenderOptions = {
  color: boolean;
};

export function renderLetter(letter: string, verdict: Verdict, { color }: RenderOptions): string {
  return color ? `${ANSI[verdict]}${letter}${RESET}` : PLAIN[verdict](letter);
}

/** "Result: " followed by each guessed letter in its verdict's style. */
export function renderAttempt(guess: string, feedback: FeedbackResult, options: RenderOptions): string {
  const letters = [...guess].map((letter, i) => renderLetter(letter, feedback.verdicts[i], options));
  return `Result: ${letters.join('')}`;
}

export function renderValidationError(error: ValidationError): string {
  return `'${error.attempt}' is not a valid word.`;
}

export function renderWin(attempts: number, maxAttempts: number): string {
  return `You won! (${attempts}/${maxAttempts})`;
}

export function renderLoss(secret: string): string {
  return `You lost. The word was "${secret}".`;
}

/** One decimal place, halves to even like printf's %.1f (6.25 → "6.2"). */
export function formatPercent(value: number): string {
  // ties between tenths are odd multiples of 0.05; as doubles only quarters are exact
  if (Number.isInteger(value * 4) && !Number.isInteger(value * 2)) {
    const tenths = Math.floor(value * 10);
    return ((tenths % 2 === 0 ? tenths : tenths + 1) / 10).toFixed(1);
  }
  return value.toFixed(1);
}

/**
 * The stats report, e.g.
 *
 *   Played: 57
 *   Win %: 96.5%
 *
 *   Guess distribution:
 *   1: 0
 *   2: *** 3
 */
export function renderSummary(summary: StatsSummary): string {
  const rows = summary.distribution.map(
    (row) => `${row.attempts}: ${row.bar ? `${row.bar} ` : ''}${row.count}`,
  );
  return [
    `Played: ${summary.played}`,
    `Win %: ${formatPercent(summary.winRate)}%`,
    '',
    'Guess distribution:',
    ...rows,
  ].join('\n');
}
