/**
 * Shared Test Helpers
 *
 * Temp-directory utilities for file-based tests across all packages.
 */

import { mkdir, mkdtemp, realpath, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { dirname, join } from 'node:path';

/**
 * Create a unique temporary test directory
 *
 * The returned path is the real path, so it compares equal to paths the code
 * under test builds with `resolve()` (macOS /var -> /private/var, Windows 8.3 names).
 *
 * @example
 * ```typescript
 * let testDir: string;
 * beforeEach(async () => {
 *   testDir = await createTempTestDir();
 * });
 * afterEach(async () => {
 *   await removeTempTestDir(testDir);
 * });
 * ```
 */
export async function createTempTestDir(prefix = 'values-schema-test-'): Promise<string> {
  const dir = await mkdtemp(join(tmpdir(), prefix));
  return realpath(dir);
}

export async function removeTempTestDir(dir: string): Promise<void> {
  await rm(dir, { recursive: true, force: true });
}

/**
 * Write a set of files below `root`, creating parent directories as needed
 *
 * @param files - Relative path -> file content
 * @returns Absolute paths of the written files, in input order
 */
export async function writeFileTree(
  root: string,
  files: Record<string, string>
): Promise<string[]> {
  const written: string[] = [];
  for (const [relativePath, content] of Object.entries(files)) {
    const target = join(root, relativePath);
    await mkdir(dirname(target), { recursive: true });
    await writeFile(target, content, 'utf-8');
    written.push(target);
  }
  return written;
}
