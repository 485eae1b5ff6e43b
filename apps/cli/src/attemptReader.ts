// apps/cli/src/attemptReader.ts
//
// Reads one guess per prompt from a line-oriented stream.
//
// Token rule (normalizeAttempt):
//   • leading whitespace is skipped; a whitespace-only line is skipped entirely
//   • the token ends at the first whitespace or after wordSize characters
//   • the token is lowercased
//
// read() resolves null once the input has ended.

import { createInterface, type Interface } from 'node:readline';

export interface AttemptReader {
  read(attemptNumber: number): Promise<string | null>;
  close(): void;
}

export function normalizeAttempt(line: string, wordSize: number): string | null {
  const rest = line.trimStart();
  if (rest === '') return null;
  const [token = ''] = rest.split(/\s/, 1);
  return token.slice(0, wordSize).toLowerCase();
}

export function formatPrompt(attemptNumber: number): string {
  return `Attempt #${attemptNumber}: `;
}

export class LineAttemptReader implements AttemptReader {
  private readonly rl: Interface;
  private readonly lines: AsyncIterator<string>;

  constructor(
    input: NodeJS.ReadableStream,
    private readonly output: NodeJS.WritableStream,
    private readonly wordSize: number,
  ) {
    this.rl = createInterface({ input, terminal: false, crlfDelay: Infinity });
    this.lines = this.rl[Symbol.asyncIterator]();
  }

  async read(attemptNumber: number): Promise<string | null> {
    this.output.write(formatPrompt(attemptNumber));
    for (;;) {
      const next = await this.lines.next();
      if (next.done) return null;
      const token = normalizeAttempt(next.value, this.wordSize);
      if (token !== null) return token;
    }
  }

  close(): void {
    this.rl.close();
  }
}
