#!/usr/bin/env node
// packages/node-runtime/src/cli.ts
import { stdin, stdout, stderr, exit as processExit } from 'node:process';
import { CommanderError } from 'commander';
import { buildProgram } from './program.js';

function reportAndExit(err: unknown): never {
  if (err instanceof Error) {
    stderr.write(`Error [${err.constructor.name}]: ${err.message}\n`);
  } else {
    stderr.write(`Error [Unknown]: ${String(err)}\n`);
  }
  processExit(1);
}

process.on('uncaughtException', reportAndExit);
process.on('unhandledRejection', reportAndExit);

async function readAllFromStdin(): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const c of stdin) chunks.push(Buffer.isBuffer(c) ? c : Buffer.from(String(c)));
  return Buffer.concat(chunks).toString('utf8');
}

const program = buildProgram({
  stdout   : chunk => { stdout.write(chunk); },
  stderr   : chunk => { stderr.write(chunk); },
  readStdin: readAllFromStdin,
});

program.parseAsync().catch((err: unknown) => {
  // commander has already printed usage errors, help and version
  if (err instanceof CommanderError) processExit(err.exitCode);
  reportAndExit(err);
});
