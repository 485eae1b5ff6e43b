// packages/game-core/src/stats.ts
//
// Player statistics: a histogram of wins by number of attempts plus a count
// of lost games. Updates are pure; persistence lives in the CLI's stats store.
//
// Exports:
//   • emptyStats    — all-zero stats for the given rules
//   • recordOutcome — fold one finished game into the stats
//   • summarize     — played count, win rate and distribution bars

import { DEFAULT_RULES, type GameRules } from './rules.js';

export type PlayerStats = {
  /** wins[k - 1] = games won on attempt k */
  wins: number[];
  losses: number;
};

export type DistributionRow = {
  attempts: number;
  count: number;
  bar: string;
};

export type StatsSummary = {
  played: number;
  won: number;
  /** percentage 0–100; 0 when nothing has been played */
  winRate: number;
  distribution: DistributionRow[];
};

export type SummaryOptions = {
  /** longest bar drawn before bars are scaled down (default 50) */
  barWidth?: number;
  barChar?: string;
};

export function emptyStats(rules: GameRules = DEFAULT_RULES): PlayerStats {
  return { wins: Array<number>(rules.maxAttempts).fill(0), losses: 0 };
}

/**
 * recordOutcome returns a copy of `stats` with one finished game added.
 *
 * @param attemptsUsed - attempts the player needed to win; `undefined` or a
 *                       value above maxAttempts records a loss
 * @throws Error when attemptsUsed is not a positive integer, or when the
 *         histogram length does not match maxAttempts
 */
export function recordOutcome(
  stats: PlayerStats,
  attemptsUsed?: number,
  rules: GameRules = DEFAULT_RULES,
): PlayerStats {
  if (stats.wins.length !== rules.maxAttempts) {
    throw new Error(
      `Stats histogram has ${stats.wins.length} entries, expected ${rules.maxAttempts}`,
    );
  }
  if (attemptsUsed !== undefined && (!Number.isInteger(attemptsUsed) || attemptsUsed < 1)) {
    throw new Error(`attemptsUsed must be a positive integer (got ${attemptsUsed})`);
  }

  if (attemptsUsed === undefined || attemptsUsed > rules.maxAttempts) {
    return { wins: [...stats.wins], losses: stats.losses + 1 };
  }
  const wins = [...stats.wins];
  wins[attemptsUsed - 1] += 1;
  return { wins, losses: stats.losses };
}

/**
 * summarize computes the report figures without touching `stats`.
 *
 * Bars carry one barChar per win. When the largest count is above barWidth
 * every bar is scaled to barWidth, rounding, and a non-zero count always
 * keeps at least one character.
 */
export function summarize(stats: PlayerStats, options: SummaryOptions = {}): StatsSummary {
  const barWidth = options.barWidth ?? 50;
  const barChar = options.barChar ?? '*';

  const won = stats.wins.reduce((sum, n) => sum + n, 0);
  const played = won + stats.losses;
  const winRate = played === 0 ? 0 : (100 * won) / played;

  const longest = Math.max(0, ...stats.wins);
  const scale = longest > barWidth ? barWidth / longest : 1;

  const distribution = stats.wins.map((count, i) => {
    const length = count === 0 ? 0 : Math.max(1, Math.round(count * scale));
    return { attempts: i + 1, count, bar: barChar.repeat(length) };
  });

  return { played, won, winRate, distribution };
}
