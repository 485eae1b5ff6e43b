// packages/protocol/src/index.ts
//
// Shared data shapes for the game and its stats record.
// Uses Zod schemas for runtime validation + TypeScript types for compile-time safety.
//
// Defines:
//   - PlayerStats:  wins per attempt count plus lost games.
//   - Stats record: the one-line text form persisted between sessions,
//                   e.g. "0 3 17 21 6 8 2\n" for six attempts.
//
// The CLI decodes the record on load and encodes it on save; anything that
// does not match the schema is reported instead of being partially read.

import { z } from 'zod';

const count = z.number().int().nonnegative().max(Number.MAX_SAFE_INTEGER);

/**
 * PlayerStats schema for a given attempt limit:
 *  - wins:   one counter per attempt count 1..maxAttempts
 *  - losses: games not won within maxAttempts
 */
export const playerStatsSchema = (maxAttempts: number) =>
  z.object({
    wins: z.array(count).length(maxAttempts),
    losses: count,
  });
export type PlayerStats = z.infer<ReturnType<typeof playerStatsSchema>>;

/* -------------------------------------------------------------------------- */
/*                                Stats record                                */
/* -------------------------------------------------------------------------- */

/** Decimal digits only: no signs, exponents or fractions. */
const countToken = z
  .string()
  .regex(/^\d+$/, 'Expected a non-negative integer')
  .transform(Number);

/**
 * Stats record schema: maxAttempts win counters followed by the loss counter.
 */
export const statsRecordSchema = (maxAttempts: number) =>
  z
    .array(countToken)
    .length(maxAttempts + 1, `Expected ${maxAttempts + 1} counters`)
    .transform((values) => ({
      wins: values.slice(0, maxAttempts),
      losses: values[maxAttempts],
    }))
    .pipe(playerStatsSchema(maxAttempts));

export type StatsRecordResult =
  | { success: true; stats: PlayerStats }
  | { success: false; error: string };

/**
 * encodeStats renders the record: space-separated counters, then a line break.
 *
 * Example:
 *   { wins: [0, 3, 17, 21, 6, 8], losses: 2 } → "0 3 17 21 6 8 2\n"
 */
export function encodeStats(stats: PlayerStats): string {
  return `${[...stats.wins, stats.losses].join(' ')}\n`;
}

/**
 * decodeStats parses a record written by encodeStats.
 * Any whitespace separates counters; a wrong counter count or a non-integer
 * token fails the whole record.
 */
export function decodeStats(text: string, maxAttempts: number): StatsRecordResult {
  const trimmed = text.trim();
  const tokens = trimmed === '' ? [] : trimmed.split(/\s+/);
  const parsed = statsRecordSchema(maxAttempts).safeParse(tokens);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const at = issue.path[0];
    const where = typeof at === 'number' ? ` (counter ${at + 1})` : '';
    return { success: false, error: `${issue.message}${where}` };
  }
  return { success: true, stats: parsed.data };
}
