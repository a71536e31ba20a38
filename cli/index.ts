#!/usr/bin/env node
// cli/index.ts — CLI entry point

import { createProgram } from './program.js';

createProgram()
  .parseAsync()
  .catch((err: unknown) => {
    const msg = err instanceof Error ? err.message : String(err);
    process.stderr.write(`[combat] ${msg}\n`);
    process.exit(1);
  });
