import type { WcError } from '../types/index.js';

export function invalidArgument(message: string): WcError {
  return { kind: 'InvalidArgument', message };
}

export function fileNotFound(path: string): WcError {
  return { kind: 'FileNotFound', message: `File not found: ${path}` };
}

export function notRegularFile(path: string): WcError {
  return { kind: 'NotRegularFile', message: `Not a regular file: ${path}` };
}

export function readFailed(source: string, cause: unknown): WcError {
  return {
    kind: 'ReadFailed',
    message: `Failed to read from ${source}: ${describeCause(cause)}`,
    cause,
  };
}

export function describeCause(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}

export function isMissingPath(error: unknown): boolean {
  return error instanceof Error && 'code' in error && (error.code === 'ENOENT' || error.code === 'ENOTDIR');
}
