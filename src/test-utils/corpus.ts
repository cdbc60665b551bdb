/**
 * Temporary corpus and data directories for tests.
 */

import { mkdtempSync, mkdirSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { dirname, join } from 'node:path';

export interface TempWorkspace {
  root: string;
  docsDir: string;
  dataDir: string;
  /** Write a file relative to docsDir */
  writeDoc: (name: string, content: string) => string;
  cleanup: () => void;
}

export function createTempWorkspace(prefix = 'ragdex-test-'): TempWorkspace {
  const root = mkdtempSync(join(tmpdir(), prefix));
  const docsDir = join(root, 'docs');
  const dataDir = join(root, 'data');
  mkdirSync(docsDir);

  return {
    root,
    docsDir,
    dataDir,
    writeDoc: (name, content) => {
      const fullPath = join(docsDir, name);
      mkdirSync(dirname(fullPath), { recursive: true });
      writeFileSync(fullPath, content);
      return fullPath;
    },
    cleanup: () => rmSync(root, { recursive: true, force: true }),
  };
}
