import type { ByteStream, CountField, OptionSet, Result } from '../types/index.js';
import { formatCounts, formatStatistics, resolveFields } from '../formatters/columns.js';
import { computeStatistics } from './analyzer.js';
import { fileSize, readSource } from './reader.js';
import { ok } from './result.js';

export async function analyzeSource(options: OptionSet, stdin: ByteStream): Promise<Result<string>> {
  const { source } = options;

  // A file's byte count comes from its metadata; stdin has to be drained.
  if (source.kind === 'file' && isSizeOnly(resolveFields(options))) {
    const size = await fileSize(source.path);
    return size.ok ? ok(formatCounts([size.value], source)) : size;
  }

  const content = await readSource(source, stdin);
  if (!content.ok) {
    return content;
  }

  return ok(formatStatistics(computeStatistics(content.value), options));
}

function isSizeOnly(fields: readonly CountField[]): boolean {
  return fields.length === 1 && fields[0] === 'bytes';
}
