// packages/game-core/src/words.ts
//
// Word list utilities.
//
//   • WordSet       → read-only set of accepted guesses, membership only
//   • createWordSet → builds a WordSet from already normalized words
//   • parseWordList → turns raw list text into a WordSet plus rejected tokens
//   • pickSecret    → random or seeded choice of the secret word
//
// The lists themselves are never bundled here; the CLI loads them from files
// and passes them in.

import { DEFAULT_RULES, isWellFormedWord, type GameRules } from './rules.js';

export type WordSet = {
  readonly rules: GameRules;
  readonly words: ReadonlySet<string>;
  readonly size: number;
  has(word: string): boolean;
};

/**
 * createWordSet wraps normalized words in an immutable WordSet.
 * Duplicates collapse; membership is an exact lowercase match.
 */
export function createWordSet(
  words: Iterable<string>,
  rules: GameRules = DEFAULT_RULES,
): WordSet {
  const set: ReadonlySet<string> = new Set(words);
  return Object.freeze({
    rules,
    words: set,
    size: set.size,
    has: (word: string) => set.has(word),
  });
}

export type ParsedWordList = {
  words: WordSet;
  /** tokens that were not `wordSize` letters a–z after normalizing */
  rejected: string[];
};

const normalizeWord = (w: string) => w.trim().toLowerCase();

/**
 * parseWordList splits list text on whitespace and keeps well-formed words.
 *
 * Example:
 *   parseWordList("Crane\nslate  x-ray\n")
 *   → { words: {crane, slate}, rejected: ["x-ray"] }
 */
export function parseWordList(
  text: string,
  rules: GameRules = DEFAULT_RULES,
): ParsedWordList {
  const accepted: string[] = [];
  const rejected: string[] = [];
  for (const token of text.split(/\s+/)) {
    if (!token) continue;
    const w = normalizeWord(token);
    if (isWellFormedWord(w, rules)) accepted.push(w);
    else rejected.push(token);
  }
  return { words: createWordSet(accepted, rules), rejected };
}

/**
 * FNV-1a over the seed's UTF-16 code units, as an unsigned 32-bit value.
 */
export function seedHash(seed: string): number {
  let h = 2166136261;
  for (let i = 0; i < seed.length; i++) {
    h ^= seed.charCodeAt(i);
    h = Math.imul(h, 16777619);
  }
  return h >>> 0;
}

/**
 * pickSecret chooses the secret word from `candidates`.
 * Candidates are sorted first, so a seeded pick does not depend on list
 * order. Without a seed the choice is random; with one it is deterministic,
 * which gives every player the same word for the same seed (e.g. a date key).
 *
 * @throws Error when there are no candidates
 */
export function pickSecret(candidates: Iterable<string>, seed?: string): string {
  const list = [...new Set(candidates)].sort();
  if (list.length === 0) throw new Error('Cannot pick a secret from an empty word list');
  const index =
    seed === undefined
      ? Math.floor(Math.random() * list.length)
      : seedHash(seed) % list.length;
  return list[index];
}
