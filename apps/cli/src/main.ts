#!/usr/bin/env -S npx tsx
import { runCli } from './cli.js';

runCli(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    console.error('[sectormap] Unexpected failure:', error);
    process.exitCode = 1;
  });
