#!/usr/bin/env node
// packages/node-runtime/src/cli.ts
import { stderr, exit as processExit } from 'node:process';
import { createProgram } from './program.js';

function report(err: unknown): never {
  if (err instanceof Error) {
    stderr.write(`Error [${err.constructor.name}]: ${err.message}\n`);
  } else {
    stderr.write(`Error [Unknown]: ${String(err)}\n`);
  }
  processExit(1);
}

process.on('uncaughtException', report);
process.on('unhandledRejection', report);

createProgram().parseAsync(process.argv).catch(report);
