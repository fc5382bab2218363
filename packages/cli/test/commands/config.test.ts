/**
 * Tests for the config command
 */

import { join } from 'node:path';

import { CONFIG_FILE_NAME } from '@values-schema/config';
import { createTempTestDir, removeTempTestDir, writeFileTree } from '@values-schema/utils';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { parse as parseYaml } from 'yaml';

import { configCommand, runConfig } from '../../src/commands/config.js';
import { setupCommanderTest, type CommanderTestEnv } from '../helpers/commander-test-setup.js';

describe('config command', () => {
  let env: CommanderTestEnv;
  let testDir: string;

  beforeEach(async () => {
    env = setupCommanderTest();
    testDir = await createTempTestDir();
  });

  afterEach(async () => {
    env.cleanup();
    await removeTempTestDir(testDir);
  });

  it('should print the JSON Schema of the config file', async () => {
    expect(await runConfig({ jsonSchema: true }, testDir)).toBe(0);

    expect(JSON.parse(env.capturedLog.join('\n'))).toMatchObject({
      $ref: '#/definitions/ValuesSchemaConfig',
      definitions: { ValuesSchemaConfig: { type: 'object', additionalProperties: false } },
    });
  });

  describe('--validate', () => {
    it('should accept a missing config file', async () => {
      expect(await runConfig({ validate: true }, testDir)).toBe(0);

      expect(env.capturedLog[0]).toContain('✅ Configuration is valid');
      expect(env.capturedLog[1]).toContain(`No ${CONFIG_FILE_NAME} found, defaults apply`);
    });

    it('should name the config file it validated', async () => {
      await writeFileTree(testDir, { [CONFIG_FILE_NAME]: 'chartSearchRoot: charts\n' });

      expect(await runConfig({ validate: true }, testDir)).toBe(0);

      expect(env.capturedLog[1]).toContain(join(testDir, CONFIG_FILE_NAME));
    });

    it('should find the config file in a parent directory', async () => {
      await writeFileTree(testDir, { [CONFIG_FILE_NAME]: 'outputFile: schema.json\n', 'charts/app/Chart.yaml': '' });

      expect(await runConfig({ validate: true }, join(testDir, 'charts/app'))).toBe(0);

      expect(env.capturedLog[1]).toContain(join(testDir, CONFIG_FILE_NAME));
    });

    it('should report validation issues', async () => {
      await writeFileTree(testDir, { [CONFIG_FILE_NAME]: 'keepFullComment: "yes"\nextra: 1\n' });

      expect(await runConfig({ validate: true }, testDir)).toBe(1);

      expect(env.capturedError[0]).toContain(`❌ Invalid configuration: ${join(testDir, CONFIG_FILE_NAME)}`);
      expect(env.capturedError).toContainEqual(
        expect.stringContaining('• keepFullComment: Expected boolean, received string')
      );
      expect(env.capturedError).toContainEqual(
        expect.stringContaining("• Unrecognized key(s) in object: 'extra'")
      );
    });

    it('should fail for an explicit config path that does not exist', async () => {
      expect(await runConfig({ validate: true, config: 'missing.yaml' }, testDir)).toBe(1);

      expect(env.capturedError[1]).toContain(`cannot read config file ${join(testDir, 'missing.yaml')}`);
    });
  });

  it('should show the resolved configuration as YAML', async () => {
    await writeFileTree(testDir, { [CONFIG_FILE_NAME]: 'outputFile: schema.json\n' });

    expect(await runConfig({}, testDir)).toBe(0);

    expect(parseYaml(env.capturedLog.join(''))).toMatchObject({
      outputFile: 'schema.json',
      valuesFiles: ['values.yaml'],
      chartSearchRoot: '.',
    });
    expect(env.capturedError).toEqual([]);
  });

  it('should note when defaults are shown', async () => {
    expect(await runConfig({}, testDir)).toBe(0);

    expect(env.capturedError).toContainEqual(expect.stringContaining(`No ${CONFIG_FILE_NAME} found, showing defaults`));
  });

  it('should exit with code 1 from the registered command', async () => {
    vi.spyOn(process, 'cwd').mockReturnValue(testDir);
    configCommand(env.program);

    await expect(
      env.program.parseAsync(['config', '--config', 'missing.yaml'], { from: 'user' })
    ).rejects.toThrow('process.exit(1)');
  });
});
