import { Command, CommanderError } from 'commander';
import chalk from 'chalk';

import type { ByteStream, CLIOptions } from './types/index.js';
import { buildOptionSet, getDefaultOptions } from './config/builder.js';
import { analyzeSource } from './core/counter.js';
import { consoleSink, writeError, writeResult, type OutputSink } from './output/writer.js';
import { Defaults } from './constants/defaults.js';
import { getVersion } from './version.js';

export interface ProgramIO extends OutputSink {
  stdin: ByteStream;
}

export function defaultIO(): ProgramIO {
  return { ...consoleSink, stdin: process.stdin };
}

type Action = (files: string[], options: CLIOptions) => Promise<void>;

export function createProgram(io: ProgramIO, action: Action): Command {
  const program = new Command();

  program
    .name(Defaults.PROGRAM_NAME)
    .description('Print newline, word, and byte counts for a file or standard input')
    .version(getVersion())
    .argument('[file...]', 'File to read; standard input when omitted')
    .option('-c, --bytes', 'Print the byte count')
    .option('-l, --lines', 'Print the newline count')
    .option('-w, --words', 'Print the word count')
    .option('-m, --chars', 'Print the character count (ignored with -c)')
    .exitOverride()
    .configureOutput({
      writeOut: (text) => io.stdout(text.replace(/\n$/, '')),
      writeErr: (text) => io.stderr(text.replace(/\n$/, '')),
      outputError: (text, write) => write(chalk.red(text)),
    })
    .action(async (files: string[] | undefined, opts: Record<string, unknown>) => {
      await action(files ?? [], {
        ...getDefaultOptions(),
        bytes: Boolean(opts.bytes),
        lines: Boolean(opts.lines),
        words: Boolean(opts.words),
        chars: Boolean(opts.chars),
      });
    });

  return program;
}

export async function run(argv: readonly string[], io: ProgramIO = defaultIO()): Promise<number> {
  let exitCode = 0;

  const program = createProgram(io, async (files, options) => {
    exitCode = await count(files, options, io);
  });

  try {
    await program.parseAsync([...argv], { from: 'user' });
  } catch (error) {
    if (error instanceof CommanderError) {
      return error.exitCode;
    }
    throw error;
  }

  return exitCode;
}

async function count(files: string[], cliOptions: CLIOptions, io: ProgramIO): Promise<number> {
  const options = buildOptionSet(files, cliOptions);
  if (!options.ok) {
    writeError(options.error, io);
    return 1;
  }

  const result = await analyzeSource(options.value, io.stdin);
  if (!result.ok) {
    writeError(result.error, io);
    return 1;
  }

  writeResult(result.value, io);
  return 0;
}
