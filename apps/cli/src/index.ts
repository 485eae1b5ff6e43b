// apps/cli/src/index.ts
//
// Terminal entry point: `guesswork` reads guesses from stdin, prints
// feedback and the stats report to stdout, and logs (pino) to stderr.
// Settings come from the environment or a .env file; see config.ts.

import 'dotenv/config';
import { main } from './main.js';

process.exitCode = await main({
  env: process.env,
  stdin: process.stdin,
  stdout: process.stdout,
  stderr: process.stderr,
});
