import { describe, expect, it } from 'vitest';
import {
  buildOptionSet,
  createOptionSet,
  getDefaultOptions,
  isDefaultMode,
  resolveSource,
} from '../../src/config/builder.js';

describe('resolveSource', () => {
  it('reads standard input when no file is given', () => {
    expect(resolveSource([])).toEqual({ ok: true, value: { kind: 'stdin' } });
  });

  it('uses the single file name as given', () => {
    expect(resolveSource(['notes/test.txt'])).toEqual({
      ok: true,
      value: { kind: 'file', path: 'notes/test.txt' },
    });
  });

  it('rejects more than one file name', () => {
    expect(resolveSource(['a.txt', 'b.txt'])).toEqual({
      ok: false,
      error: { kind: 'InvalidArgument', message: 'Multiple filenames not supported: a.txt, b.txt' },
    });
  });

  it('rejects an empty file name', () => {
    expect(resolveSource([''])).toEqual({
      ok: false,
      error: { kind: 'InvalidArgument', message: 'File name must not be empty' },
    });
  });
});

describe('buildOptionSet', () => {
  it('maps command-line flags onto count flags', () => {
    const result = buildOptionSet(['test.txt'], { ...getDefaultOptions(), bytes: true, chars: true });

    expect(result).toEqual({
      ok: true,
      value: {
        countBytes: true,
        countLines: false,
        countWords: false,
        countChars: true,
        source: { kind: 'file', path: 'test.txt' },
      },
    });
  });

  it('returns a frozen option set', () => {
    const result = buildOptionSet([], getDefaultOptions());
    if (!result.ok) {
      throw new Error(result.error.message);
    }

    expect(Object.isFrozen(result.value)).toBe(true);
    expect(Object.isFrozen(result.value.source)).toBe(true);
  });

  it('propagates source errors', () => {
    const result = buildOptionSet(['a', 'b', 'c'], getDefaultOptions());
    expect(result.ok).toBe(false);
  });
});

describe('isDefaultMode', () => {
  it('is true only when no flag is set', () => {
    const stdin = { kind: 'stdin' } as const;

    expect(isDefaultMode(createOptionSet({}, stdin))).toBe(true);
    expect(isDefaultMode(createOptionSet({ countLines: true }, stdin))).toBe(false);
    expect(isDefaultMode(createOptionSet({ countChars: true }, stdin))).toBe(false);
    expect(
      isDefaultMode(createOptionSet({ countBytes: true, countLines: true, countWords: true, countChars: true }, stdin))
    ).toBe(false);
  });
});
