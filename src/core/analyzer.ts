import type { Statistics } from '../types/index.js';
import { NEWLINE_BYTE, WORD_SEPARATOR } from '../constants/defaults.js';

/**
 * Decodes UTF-8 without failing: every maximal invalid subsequence becomes a
 * single U+FFFD, and a leading byte order mark is kept as a character.
 */
export function decodeUtf8(bytes: Uint8Array): string {
  return new TextDecoder('utf-8', { fatal: false, ignoreBOM: true }).decode(bytes);
}

export function computeByteCount(bytes: Uint8Array): number {
  return bytes.length;
}

export function computeLineCount(bytes: Uint8Array): number {
  let count = 0;
  let index = bytes.indexOf(NEWLINE_BYTE);

  while (index !== -1) {
    count++;
    index = bytes.indexOf(NEWLINE_BYTE, index + 1);
  }

  return count;
}

export function computeWordCount(bytes: Uint8Array): number {
  return countWords(decodeUtf8(bytes));
}

export function computeCharCount(bytes: Uint8Array): number {
  return countCodePoints(decodeUtf8(bytes));
}

export function computeStatistics(bytes: Uint8Array): Statistics {
  const text = decodeUtf8(bytes);

  return {
    byteCount: computeByteCount(bytes),
    lineCount: computeLineCount(bytes),
    wordCount: countWords(text),
    charCount: countCodePoints(text),
  };
}

export function countWords(text: string): number {
  return text.split(WORD_SEPARATOR).filter((token) => token.length > 0).length;
}

// Astral code points occupy two UTF-16 units but count once.
export function countCodePoints(text: string): number {
  let count = 0;

  for (let index = 0; index < text.length; count++) {
    const codePoint = text.codePointAt(index) ?? 0;
    index += codePoint > 0xffff ? 2 : 1;
  }

  return count;
}
