import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

export interface TempDir {
  readonly dir: string;
  readonly write: (name: string, content: string | Uint8Array) => string;
  readonly cleanup: () => void;
}

/**
 * Scratch directory under the OS temp dir; `write` returns the absolute path
 * of the created file.
 */
export function createTempDir(): TempDir {
  const dir = mkdtempSync(join(tmpdir(), 'ccwc-'));

  return {
    dir,
    write: (name, content) => {
      const path = join(dir, name);
      writeFileSync(path, content);
      return path;
    },
    cleanup: () => rmSync(dir, { recursive: true, force: true }),
  };
}
