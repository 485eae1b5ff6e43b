// packages/game-core/src/scoring.ts
//
// Letter feedback for a guess against the secret word.
// Implements the two-pass algorithm with explicit position consumption so
// repeated letters are never over-credited.
//
// Verdict legend:
//   - "correct": right letter, right position
//   - "present": letter occurs at a secret position not yet accounted for
//   - "absent":  no unconsumed secret position holds this letter
//
// Rules:
//   • Both words must be exactly rules.wordSize lowercase a–z letters.
//   • Pass 1 consumes every exactly matched secret position.
//   • Pass 2 consumes the leftmost unconsumed secret position holding the
//     guessed letter, or marks the letter absent.

import { DEFAULT_RULES, isWellFormedWord, type GameRules } from './rules.js';

export type Verdict = 'correct' | 'present' | 'absent';

export type FeedbackResult = {
  verdicts: Verdict[];
  /** true iff every verdict is "correct" */
  solved: boolean;
};

/**
 * scoreGuess compares a guess against the secret and produces a per-letter evaluation.
 *
 * @param secret - the word to be found
 * @param guess  - the player's (already validated) guess
 * @throws Error when either word is not a well-formed word for `rules`
 *
 * Example:
 *   secret = "bread", guess = "erase"
 *   → ["present", "correct", "present", "absent", "absent"]
 */
export function scoreGuess(
  secret: string,
  guess: string,
  rules: GameRules = DEFAULT_RULES,
): FeedbackResult {
  if (!isWellFormedWord(secret, rules) || !isWellFormedWord(guess, rules)) {
    throw new Error(
      `Words must be ${rules.wordSize} lowercase letters (got "${secret}" and "${guess}")`,
    );
  }

  const size = rules.wordSize;
  const verdicts: Verdict[] = Array<Verdict>(size).fill('absent');
  const consumed: boolean[] = Array<boolean>(size).fill(false);

  // Pass 1: exact matches
  for (let i = 0; i < size; i++) {
    if (guess[i] === secret[i]) {
      verdicts[i] = 'correct';
      consumed[i] = true;
    }
  }

  // Pass 2: leftmost unconsumed match elsewhere
  for (let i = 0; i < size; i++) {
    if (verdicts[i] === 'correct') continue;
    for (let j = 0; j < size; j++) {
      if (!consumed[j] && secret[j] === guess[i]) {
        verdicts[i] = 'present';
        consumed[j] = true;
        break;
      }
    }
  }

  return { verdicts, solved: isSolved(verdicts) };
}

/** Checks if a verdict sequence is fully correct. */
export function isSolved(verdicts: readonly Verdict[]): boolean {
  return verdicts.length > 0 && verdicts.every((v) => v === 'correct');
}

/** Compact one-character-per-letter key, e.g. "?O__?". */
export function verdictKey(verdicts: readonly Verdict[]): string {
  return verdicts
    .map((v) => (v === 'correct' ? 'O' : v === 'present' ? '?' : '_'))
    .join('');
}
