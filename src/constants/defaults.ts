import type { CountField, Statistics } from '../types/index.js';

export const Defaults = {
  PROGRAM_NAME: 'ccwc',
  FIELD_WIDTH: 8,
  STDIN_LABEL: 'standard input',
} as const;

export const DEFAULT_FIELDS: readonly CountField[] = ['lines', 'words', 'bytes'];

export const FIELD_STATISTIC: Readonly<Record<CountField, keyof Statistics>> = {
  lines: 'lineCount',
  words: 'wordCount',
  bytes: 'byteCount',
  chars: 'charCount',
};

// space, \t, \n, \v, \f, \r
export const WORD_SEPARATOR = /[ \t\n\v\f\r]+/;

export const NEWLINE_BYTE = 0x0a;
