// apps/cli/src/statsStore.ts
//
// Persistence for PlayerStats.
//
//   • StatsStore     → what a session needs: load once, save once
//   • FileStatsStore → one-line text record on disk (see @guesswork/protocol)
//
// Loading never yields partial data: a missing record is all zeros, and a
// malformed one is reset to zeros with a warning and status "corrupt".

import { readFile, rename, rm, writeFile } from 'node:fs/promises';
import { emptyStats, type GameRules, type PlayerStats } from '@guesswork/game-core';
import { decodeStats, encodeStats } from '@guesswork/protocol';
import { isNotFound, StartupError } from './errors.js';
import type { Logger } from './logger.js';

export type StatsLoadStatus = 'missing' | 'loaded' | 'corrupt';

export type LoadedStats = {
  stats: PlayerStats;
  status: StatsLoadStatus;
};

export interface StatsStore {
  load(): Promise<LoadedStats>;
  /** Rejects when the stats could not be persisted. */
  save(stats: PlayerStats): Promise<void>;
}

export class FileStatsStore implements StatsStore {
  constructor(
    private readonly path: string,
    private readonly rules: GameRules,
    private readonly log: Logger,
  ) {}

  async load(): Promise<LoadedStats> {
    let text: string;
    try {
      text = await readFile(this.path, 'utf8');
    } catch (err) {
      if (isNotFound(err)) return { stats: emptyStats(this.rules), status: 'missing' };
      throw new StartupError(`Could not read stats file "${this.path}"`, { cause: err });
    }

    const decoded = decodeStats(text, this.rules.maxAttempts);
    if (!decoded.success) {
      this.log.warn({ path: this.path, reason: decoded.error }, 'stats file is malformed; starting from zero');
      return { stats: emptyStats(this.rules), status: 'corrupt' };
    }
    return { stats: decoded.stats, status: 'loaded' };
  }

  /** Writes a sibling temp file, then renames it over the record. */
  async save(stats: PlayerStats): Promise<void> {
    const tmp = `${this.path}.${process.pid}.tmp`;
    try {
      await writeFile(tmp, encodeStats(stats), 'utf8');
      await rename(tmp, this.path);
    } catch (err) {
      await rm(tmp, { force: true });
      throw err;
    }
    this.log.debug({ path: this.path }, 'stats saved');
  }
}
