// packages/game-core/src/index.ts
//
// Entry point for the game-core package.
// Re-exports all core game logic so consumers can import from one place.
//
// Includes:
//   • rules.ts      → word size / attempt limits (GameRules, DEFAULT_RULES)
//   • scoring.ts    → duplicate-aware feedback (scoreGuess, Verdict)
//   • words.ts      → WordSet, list parsing, secret picking
//   • validation.ts → attempt gatekeeping (validateAttempt)
//   • stats.ts      → outcome tally and summary (recordOutcome, summarize)
//
// Example usage:
//   import { scoreGuess, validateAttempt, summarize } from '@guesswork/game-core';

export * from './rules.js';
export * from './scoring.js';
export * from './words.js';
export * from './validation.js';
export * from './stats.js';
