/**
 * Tests for configuration loader
 */

import { join } from 'node:path';

import { afterEach, beforeEach, describe, it, expect } from 'vitest';

import { createTempTestDir, removeTempTestDir, writeFileTree } from '@values-schema/utils';

import { ConfigError } from '../src/errors.js';
import { CONFIG_FILE_NAME, findAndLoadConfig, findConfigUp, loadConfigFromFile } from '../src/loader.js';

describe('loader', () => {
  let testDir: string;

  beforeEach(async () => {
    testDir = await createTempTestDir('values-schema-config-');
  });

  afterEach(async () => {
    await removeTempTestDir(testDir);
  });

  describe('findConfigUp', () => {
    it('should find the config in an ancestor directory', async () => {
      const [configPath] = await writeFileTree(testDir, {
        [CONFIG_FILE_NAME]: 'outputFile: schema.json\n',
        'charts/app/Chart.yaml': 'name: app\n',
      });

      expect(findConfigUp(join(testDir, 'charts', 'app'))).toBe(configPath);
    });
  });

  describe('loadConfigFromFile', () => {
    it('should load a YAML config relative to its directory', async () => {
      const [configPath] = await writeFileTree(testDir, {
        [CONFIG_FILE_NAME]: ['chartSearchRoot: charts', 'skipGlobal: true', ''].join('\n'),
      });

      const loaded = await loadConfigFromFile(configPath);

      expect(loaded.filePath).toBe(configPath);
      expect(loaded.baseDir).toBe(testDir);
      expect(loaded.config.chartSearchRoot).toBe('charts');
      expect(loaded.config.skipGlobal).toBe(true);
      expect(loaded.config.outputFile).toBe('values.schema.json');
    });

    it('should treat an empty file as defaults', async () => {
      const [configPath] = await writeFileTree(testDir, { [CONFIG_FILE_NAME]: '# nothing yet\n' });

      const loaded = await loadConfigFromFile(configPath);

      expect(loaded.config.valuesFiles).toEqual(['values.yaml']);
    });

    it('should throw error for unsupported config format', async () => {
      const [configPath] = await writeFileTree(testDir, { 'values-schema.config.json': '{}' });

      await expect(loadConfigFromFile(configPath)).rejects.toThrow('Unsupported config file format');
    });

    it('should report YAML syntax errors', async () => {
      const [configPath] = await writeFileTree(testDir, { [CONFIG_FILE_NAME]: 'valuesFiles: [values.yaml\n' });

      await expect(loadConfigFromFile(configPath)).rejects.toThrow(`YAML syntax error in ${configPath}`);
    });

    it('should list schema violations on the error', async () => {
      const [configPath] = await writeFileTree(testDir, { [CONFIG_FILE_NAME]: 'keepFullComment: sometimes\n' });

      const error = await loadConfigFromFile(configPath).catch((caught: unknown) => caught);

      expect(error).toBeInstanceOf(ConfigError);
      expect(error).toMatchObject({
        filePath: configPath,
        issues: ['keepFullComment: Expected boolean, received string'],
      });
    });

    it('should reject configs that are not mappings', async () => {
      const [configPath] = await writeFileTree(testDir, { [CONFIG_FILE_NAME]: '- values.yaml\n' });

      await expect(loadConfigFromFile(configPath)).rejects.toThrow('Configuration must be an object');
    });

    it('should fail for missing files', async () => {
      await expect(loadConfigFromFile(join(testDir, CONFIG_FILE_NAME))).rejects.toThrow('cannot read config file');
    });
  });

  describe('findAndLoadConfig', () => {
    it('should fall back to defaults based in the working directory', async () => {
      const loaded = await findAndLoadConfig(testDir);

      expect(loaded.filePath).toBeUndefined();
      expect(loaded.baseDir).toBe(testDir);
      expect(loaded.config.outputFile).toBe('values.schema.json');
    });

    it('should load the nearest config file', async () => {
      await writeFileTree(testDir, {
        [CONFIG_FILE_NAME]: 'appendNewline: true\n',
        'charts/.keep': '',
      });

      const loaded = await findAndLoadConfig(join(testDir, 'charts'));

      expect(loaded.config.appendNewline).toBe(true);
      expect(loaded.baseDir).toBe(testDir);
    });
  });
});
