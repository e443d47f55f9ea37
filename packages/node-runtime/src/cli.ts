#!/usr/bin/env node
// packages/node-runtime/src/cli.ts
import { stderr, exit as processExit } from 'node:process';
import { createProgram, describeError } from './program.js';

process.on('uncaughtException', err => {
  stderr.write(describeError(err) + '\n');
  processExit(1);
});

try {
  await createProgram().parseAsync(process.argv);
} catch (err) {
  stderr.write(describeError(err) + '\n');
  processExit(1);
}
