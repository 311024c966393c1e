#!/usr/bin/env node
/**
 * thanos CLI
 */
import { runCli } from './cli/main.js';

runCli(process.argv.slice(2))
  .then((exitCode) => {
    process.exitCode = exitCode;
  })
  .catch((err: unknown) => {
    console.error('[thanos] Fatal error:', err instanceof Error ? err.message : String(err));
    process.exitCode = 1;
  });
