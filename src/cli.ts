#!/usr/bin/env node
import { run } from './program.js';
import { createNodeRuntime } from './shared/runtime.js';

run(process.argv.slice(2), createNodeRuntime()).then(
  (code) => {
    process.exitCode = code;
  },
  (err: unknown) => {
    process.stderr.write(`Error: ${err instanceof Error ? err.message : String(err)}\n`);
    process.exitCode = 1;
  }
);
