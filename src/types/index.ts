export type CountField = 'lines' | 'words' | 'bytes' | 'chars';

export type InputSource =
  | { readonly kind: 'file'; readonly path: string }
  | { readonly kind: 'stdin' };

export interface OptionSet {
  readonly countBytes: boolean;
  readonly countLines: boolean;
  readonly countWords: boolean;
  readonly countChars: boolean;
  readonly source: InputSource;
}

export interface Statistics {
  readonly byteCount: number;
  readonly lineCount: number;
  readonly wordCount: number;
  readonly charCount: number;
}

export interface CLIOptions {
  bytes: boolean;
  lines: boolean;
  words: boolean;
  chars: boolean;
}

export type WcErrorKind = 'InvalidArgument' | 'FileNotFound' | 'NotRegularFile' | 'ReadFailed';

export interface WcError {
  readonly kind: WcErrorKind;
  readonly message: string;
  readonly cause?: unknown;
}

export type Result<T, E = WcError> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: E };

export type ByteStream = AsyncIterable<Uint8Array | string>;
