import { readFile, stat } from 'node:fs/promises';
import type { ByteStream, InputSource, Result } from '../types/index.js';
import { Defaults } from '../constants/defaults.js';
import { fileNotFound, isMissingPath, notRegularFile, readFailed } from './errors.js';
import { err, ok } from './result.js';

export async function fileSize(path: string): Promise<Result<number>> {
  try {
    const info = await stat(path);
    if (!info.isFile()) {
      return err(notRegularFile(path));
    }
    return ok(info.size);
  } catch (error) {
    return err(isMissingPath(error) ? fileNotFound(path) : readFailed(path, error));
  }
}

export async function readSource(source: InputSource, stdin: ByteStream): Promise<Result<Buffer>> {
  switch (source.kind) {
    case 'file':
      return readFromFile(source.path);
    case 'stdin':
      return readStream(stdin);
  }
}

export async function readStream(stream: ByteStream): Promise<Result<Buffer>> {
  const chunks: Buffer[] = [];

  try {
    for await (const chunk of stream) {
      chunks.push(typeof chunk === 'string' ? Buffer.from(chunk, 'utf-8') : Buffer.from(chunk));
    }
  } catch (error) {
    return err(readFailed(Defaults.STDIN_LABEL, error));
  }

  return ok(Buffer.concat(chunks));
}

async function readFromFile(path: string): Promise<Result<Buffer>> {
  const checked = await fileSize(path);
  if (!checked.ok) {
    return checked;
  }

  try {
    return ok(await readFile(path));
  } catch (error) {
    return err(isMissingPath(error) ? fileNotFound(path) : readFailed(path, error));
  }
}
