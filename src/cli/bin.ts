#!/usr/bin/env node
import 'dotenv/config';

import { runCli, EXIT_FAILURE } from './generate-meme.js';

const controller = new AbortController();
process.once('SIGINT', () => {
  controller.abort(new Error('Interrupted'));
});

runCli(
  process.argv.slice(2),
  {
    stdout: (line) => process.stdout.write(`${line}\n`),
    stderr: (line) => process.stderr.write(`${line}\n`),
  },
  controller.signal,
)
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    process.stderr.write(`fatal: ${error instanceof Error ? error.stack ?? error.message : String(error)}\n`);
    process.exitCode = EXIT_FAILURE;
  });
