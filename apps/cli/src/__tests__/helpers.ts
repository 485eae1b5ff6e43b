// apps/cli/src/__tests__/helpers.ts
//
// In-process stand-ins for the terminal, the stats record and the log sink.

import { Writable } from 'node:stream';
import { emptyStats, type GameRules, type PlayerStats } from '@guesswork/game-core';
import pino from 'pino';
import type { AttemptReader } from '../attemptReader';
import type { Logger } from '../logger';
import type { LoadedStats, StatsStore } from '../statsStore';

/** Writable that keeps everything written to it as text. */
export class TextSink extends Writable {
  text = '';

  override _write(
    chunk: Buffer | string,
    _encoding: BufferEncoding,
    callback: (error?: Error | null) => void,
  ): void {
    this.text += String(chunk);
    callback();
  }
}

/** Plays back a fixed list of inputs; an Error entry makes that read fail. */
export class ScriptedReader implements AttemptReader {
  readonly prompts: number[] = [];
  closed = false;

  constructor(private readonly inputs: Array<string | Error>) {}

  async read(attemptNumber: number): Promise<string | null> {
    this.prompts.push(attemptNumber);
    const next = this.inputs.shift();
    if (next === undefined) return null;
    if (next instanceof Error) throw next;
    return next;
  }

  close(): void {
    this.closed = true;
  }
}

/** Keeps the record in memory; `failSaveWith` makes every save reject. */
export class MemoryStatsStore implements StatsStore {
  readonly saved: PlayerStats[] = [];

  constructor(
    private readonly rules: GameRules,
    private initial?: PlayerStats,
    private readonly failSaveWith?: Error,
  ) {}

  async load(): Promise<LoadedStats> {
    if (!this.initial) return { stats: emptyStats(this.rules), status: 'missing' };
    return { stats: { wins: [...this.initial.wins], losses: this.initial.losses }, status: 'loaded' };
  }

  async save(stats: PlayerStats): Promise<void> {
    if (this.failSaveWith) throw this.failSaveWith;
    this.saved.push(stats);
    this.initial = stats;
  }
}

export const silentLogger = (): Logger => pino({ level: 'silent' });

/** Messages of the JSON log lines written to `sink`. */
export function logMessages(sink: TextSink): string[] {
  return sink.text
    .split('\n')
    .filter(Boolean)
    .map((line) => {
      const entry: unknown = JSON.parse(line);
      return typeof entry === 'object' && entry !== null && 'msg' in entry
        ? String(entry.msg)
        : '';
    });
}
