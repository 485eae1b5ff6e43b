// packages/game-core/src/validation.ts
//
// Gatekeeper between raw player input and the scorer.
// Classifies an attempt; formatting a diagnostic is left to the caller.

import type { WordSet } from './words.js';

export type ValidationErrorCode = 'wrong-length' | 'not-in-word-list';

export type ValidationError = {
  code: ValidationErrorCode;
  /** the attempt exactly as it was submitted */
  attempt: string;
};

export type ValidationResult =
  | { success: true; word: string }
  | { success: false; error: ValidationError };

/**
 * validateAttempt checks, in order:
 *   1. length equals the word set's wordSize  → else "wrong-length"
 *   2. lowercased attempt is in the word set  → else "not-in-word-list"
 *
 * On success `word` is the lowercased attempt.
 */
export function validateAttempt(words: WordSet, attempt: string): ValidationResult {
  if (attempt.length !== words.rules.wordSize) {
    return { success: false, error: { code: 'wrong-length', attempt } };
  }
  const word = attempt.toLowerCase();
  if (!words.has(word)) {
    return { success: false, error: { code: 'not-in-word-list', attempt } };
  }
  return { success: true, word };
}
