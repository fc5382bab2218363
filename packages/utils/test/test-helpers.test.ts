import { existsSync } from 'node:fs';
import { readFile } from 'node:fs/promises';
import { join } from 'node:path';

import { describe, expect, it } from 'vitest';

import { createTempTestDir, removeTempTestDir, writeFileTree } from '../src/test-helpers.js';

describe('test helpers', () => {
  it('should write nested files and remove the directory', async () => {
    const dir = await createTempTestDir();

    const written = await writeFileTree(dir, { 'a/b/values.yaml': 'x: 1\n', 'Chart.yaml': 'name: c\n' });

    expect(written).toEqual([join(dir, 'a/b/values.yaml'), join(dir, 'Chart.yaml')]);
    expect(await readFile(join(dir, 'a/b/values.yaml'), 'utf-8')).toBe('x: 1\n');

    await removeTempTestDir(dir);
    expect(existsSync(dir)).toBe(false);
  });
});
