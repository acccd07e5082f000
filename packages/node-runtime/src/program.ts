// packages/node-runtime/src/program.ts
import { Command, Option } from 'commander';
import {
  FrontendEncoder,
  MESSAGE_TAGS,
  isVerbosity,
  type MessageKind,
} from '../../core/src/index.js';
import { parseMessages } from './messageSchema.js';

export const PKG_VERSION = '0.3.0'; // sync with root package.json

export type OutputFormat = 'hex' | 'base64' | 'raw';

/** Process streams the program talks to; swapped out in tests. */
export interface ProgramIO {
  stdout   : (chunk: string | Uint8Array) => void;
  stderr   : (chunk: string) => void;
  readStdin: () => Promise<string>;
}

function increaseVerbosity(_: string, previous: number): number {
  return previous + 1;
}

export function buildProgram(io: ProgramIO): Command {
  const program = new Command();

  program
    .name('pgframe')
    .version(PKG_VERSION)
    .description('Encode PostgreSQL frontend protocol messages described as JSON')
    .exitOverride()
    .configureOutput({
      writeOut: str => io.stdout(str),
      writeErr: str => io.stderr(str),
    })

    // verbosity (repeatable)
    .addOption(
      new Option('-v, --verbose', 'increase verbosity (use multiple times)')
        .argParser(increaseVerbosity)
        .default(0)
    );

  /* ------------------------------------------------------------------ */
  /*  encode                                                             */
  /* ------------------------------------------------------------------ */
  program
    .command('encode [json]')
    .description('Encode one message object or an array of them; omit arg or use - to read from STDIN')
    .addOption(
      new Option('-f, --format <format>', 'output format')
        .choices(['hex', 'base64', 'raw'] as const)
        .default('hex')
    )
    .action(async (json: string | undefined, cmd: { format: OutputFormat }) => {
      const text     = json === undefined || json === '-' ? await io.readStdin() : json;
      const messages = parseMessages(text);

      const verbose: number = program.opts<{ verbose: number }>().verbose;
      const encoder  = new FrontendEncoder({
        verbose: isVerbosity(verbose) ? verbose : 4,
        logger : msg => io.stderr(msg + '\n'),
      });

      const out = encoder.encode(messages);
      switch (cmd.format) {
        case 'raw':    io.stdout(out.uint8array);  break;
        case 'base64': io.stdout(out.base64 + '\n'); break;
        case 'hex':    io.stdout(out.hex + '\n');    break;
      }
    });

  /* ------------------------------------------------------------------ */
  /*  tags                                                               */
  /* ------------------------------------------------------------------ */
  program
    .command('tags')
    .description('List message kinds and the tag byte each is sent with')
    .action(() => {
      const kinds = Object.keys(MESSAGE_TAGS).filter(
        (k): k is MessageKind => k in MESSAGE_TAGS,
      );
      for (const kind of kinds) {
        const tag = MESSAGE_TAGS[kind];
        const shown = tag === null ? '-' : String.fromCharCode(tag);
        io.stdout(`${kind.padEnd(14)}${shown}\n`);
      }
    });

  return program;
}
