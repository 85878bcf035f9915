import type { CLIOptions, InputSource, OptionSet, Result } from '../types/index.js';
import { invalidArgument } from '../core/errors.js';
import { err, ok } from '../core/result.js';

export function isDefaultMode(options: OptionSet): boolean {
  return !(options.countBytes || options.countLines || options.countWords || options.countChars);
}

export function createOptionSet(fields: Partial<Omit<OptionSet, 'source'>>, source: InputSource): OptionSet {
  return Object.freeze({
    countBytes: fields.countBytes ?? false,
    countLines: fields.countLines ?? false,
    countWords: fields.countWords ?? false,
    countChars: fields.countChars ?? false,
    source: Object.freeze({ ...source }),
  });
}

export function resolveSource(files: readonly string[]): Result<InputSource> {
  const [path, ...rest] = files;

  if (path === undefined) {
    return ok({ kind: 'stdin' });
  }

  if (rest.length > 0) {
    return err(invalidArgument(`Multiple filenames not supported: ${files.join(', ')}`));
  }

  if (path.length === 0) {
    return err(invalidArgument('File name must not be empty'));
  }

  return ok({ kind: 'file', path });
}

export function buildOptionSet(files: readonly string[], options: CLIOptions): Result<OptionSet> {
  const source = resolveSource(files);
  if (!source.ok) {
    return source;
  }

  return ok(
    createOptionSet(
      {
        countBytes: options.bytes,
        countLines: options.lines,
        countWords: options.words,
        countChars: options.chars,
      },
      source.value
    )
  );
}

export function getDefaultOptions(): CLIOptions {
  return {
    bytes: false,
    lines: false,
    words: false,
    chars: false,
  };
}
