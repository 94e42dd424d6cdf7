import { mkdirSync, writeFileSync, rmSync } from 'fs';
import { dirname, join } from 'path';
import { tmpdir } from 'os';

let counter = 0;

export function createFixture(name: string): string {
  const root = join(tmpdir(), `dirpack-test-${name}-${Date.now()}-${counter++}`);
  mkdirSync(root, { recursive: true });
  return root;
}

/** Write files given as relative path -> content; parent directories are created. */
export function writeFiles(root: string, files: Record<string, string | Uint8Array>): void {
  for (const [rel, content] of Object.entries(files)) {
    const abs = join(root, rel);
    mkdirSync(dirname(abs), { recursive: true });
    writeFileSync(abs, content);
  }
}

export function removeFixture(root: string): void {
  rmSync(root, { recursive: true, force: true });
}
