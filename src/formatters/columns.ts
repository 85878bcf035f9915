import type { CountField, InputSource, OptionSet, Statistics } from '../types/index.js';
import { Defaults, DEFAULT_FIELDS, FIELD_STATISTIC } from '../constants/defaults.js';
import { isDefaultMode } from '../config/builder.js';

/**
 * Columns to print, in `wc` order. Bytes win over characters when both are
 * requested; with no flag at all the result is lines, words, bytes.
 */
export function resolveFields(options: OptionSet): CountField[] {
  if (isDefaultMode(options)) {
    return [...DEFAULT_FIELDS];
  }

  const fields: CountField[] = [];

  if (options.countLines) {
    fields.push('lines');
  }

  if (options.countWords) {
    fields.push('words');
  }

  if (options.countBytes) {
    fields.push('bytes');
  } else if (options.countChars) {
    fields.push('chars');
  }

  return fields;
}

export function formatField(value: number): string {
  return String(value).padStart(Defaults.FIELD_WIDTH);
}

export function formatCounts(values: readonly number[], source: InputSource): string {
  const columns = values.map(formatField).join('');

  switch (source.kind) {
    case 'file':
      return `${columns} ${source.path}`;
    case 'stdin':
      return columns;
  }
}

export function formatStatistics(stats: Statistics, options: OptionSet): string {
  const values = resolveFields(options).map((field) => stats[FIELD_STATISTIC[field]]);
  return formatCounts(values, options.source);
}
