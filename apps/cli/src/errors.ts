// apps/cli/src/errors.ts
//
// Failures that stop the CLI before a game starts. Both carry a message fit
// for the player; the underlying error, if any, rides along as `cause`.

export class StartupError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'StartupError';
  }
}

export class ConfigError extends StartupError {
  constructor(readonly issues: string[]) {
    super(`Invalid configuration:\n${issues.map((i) => `  - ${i}`).join('\n')}`);
    this.name = 'ConfigError';
  }
}

/** true for a Node system error with code ENOENT */
export function isNotFound(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}
