#!/usr/bin/env node

import { run } from '../src/cli.js';

run(process.argv).then(
  (code) => {
    process.exitCode = code;
  },
  (err: unknown) => {
    console.error('Fatal error:', err);
    process.exitCode = 1;
  },
);
