// packages/game-core/src/rules.ts
//
// Game dimensions shared by every core operation.
//
//   • wordSize    → letters per secret and guess (5 in the classic game)
//   • maxAttempts → guesses allowed per game (6 in the classic game)
//
// Operations take a GameRules argument defaulting to DEFAULT_RULES, so the
// CLI can run other sizes without any module-level state.

export type GameRules = {
  readonly wordSize: number;
  readonly maxAttempts: number;
};

export const WORD_SIZE = 5;
export const MAX_ATTEMPTS = 6;

export const DEFAULT_RULES: GameRules = {
  wordSize: WORD_SIZE,
  maxAttempts: MAX_ATTEMPTS,
};

/** True when `word` is exactly `wordSize` lowercase a–z letters. */
export function isWellFormedWord(word: string, rules: GameRules = DEFAULT_RULES): boolean {
  return word.length === rules.wordSize && /^[a-z]+$/.test(word);
}
