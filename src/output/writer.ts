import chalk from 'chalk';
import type { WcError } from '../types/index.js';

export interface OutputSink {
  stdout: (text: string) => void;
  stderr: (text: string) => void;
}

export const consoleSink: OutputSink = {
  stdout: (text) => console.log(text),
  stderr: (text) => console.error(text),
};

export function writeResult(content: string, sink: OutputSink): void {
  sink.stdout(content);
}

export function writeError(error: WcError, sink: OutputSink): void {
  sink.stderr(chalk.red(`Error: ${error.message}`));
}

export function writeUnexpected(error: unknown, sink: OutputSink): void {
  sink.stderr(chalk.red(`Unexpected error: ${error instanceof Error ? error.message : String(error)}`));
}
