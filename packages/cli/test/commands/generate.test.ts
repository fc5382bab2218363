/**
 * Tests for the generate command
 */

import { existsSync } from 'node:fs';
import { readFile } from 'node:fs/promises';
import { join } from 'node:path';

import { DRAFT_07_SCHEMA, GLOBAL_DESCRIPTION } from '@values-schema/core';
import { createTempTestDir, removeTempTestDir, writeFileTree } from '@values-schema/utils';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { generateCommand, parseCommaList, parsePositiveInteger, runGenerate } from '../../src/commands/generate.js';
import { chartFiles, FakeSchemaFetcher } from '../helpers/chart-fixtures.js';
import { setupCommanderTest, type CommanderTestEnv } from '../helpers/commander-test-setup.js';

async function readJson(path: string): Promise<unknown> {
  return JSON.parse(await readFile(path, 'utf-8'));
}

describe('generate command', () => {
  let env: CommanderTestEnv;
  let testDir: string;
  let fetcher: FakeSchemaFetcher;

  beforeEach(async () => {
    env = setupCommanderTest();
    testDir = await createTempTestDir();
    fetcher = new FakeSchemaFetcher();
  });

  afterEach(async () => {
    env.cleanup();
    await removeTempTestDir(testDir);
  });

  describe('runGenerate', () => {
    it('should write values.schema.json next to the values file', async () => {
      await writeFileTree(testDir, chartFiles('charts/app', 'replicaCount: 1\n'));

      const exitCode = await runGenerate({}, { cwd: testDir, fetcher });

      expect(exitCode).toBe(0);
      expect(await readJson(join(testDir, 'charts/app/values.schema.json'))).toEqual({
        $schema: DRAFT_07_SCHEMA,
        type: 'object',
        properties: {
          replicaCount: { type: 'integer', title: 'replicaCount', default: 1 },
          global: { type: 'object', title: 'global', description: GLOBAL_DESCRIPTION },
        },
        additionalProperties: false,
        required: ['replicaCount'],
      });
      expect(env.capturedLog).toContainEqual(expect.stringContaining(join('charts', 'app', 'values.schema.json')));
    });

    it('should end the file with a newline only when asked', async () => {
      await writeFileTree(testDir, { ...chartFiles('a', 'x: 1\n'), ...chartFiles('b', 'y: 2\n') });

      await runGenerate({ chartSearchRoot: 'a' }, { cwd: testDir, fetcher });
      await runGenerate({ chartSearchRoot: 'b', appendNewline: true }, { cwd: testDir, fetcher });

      expect((await readFile(join(testDir, 'a/values.schema.json'), 'utf-8')).endsWith('}')).toBe(true);
      expect((await readFile(join(testDir, 'b/values.schema.json'), 'utf-8')).endsWith('}\n')).toBe(true);
    });

    it('should print schemas instead of writing them in dry-run mode', async () => {
      await writeFileTree(testDir, chartFiles('app', 'name: web\n'));

      const exitCode = await runGenerate({ dryRun: true }, { cwd: testDir, fetcher });

      expect(exitCode).toBe(0);
      expect(existsSync(join(testDir, 'app/values.schema.json'))).toBe(false);
      expect(env.capturedLog).toHaveLength(1);
      expect(JSON.parse(env.capturedLog[0] ?? '')).toMatchObject({
        properties: { name: { type: 'string', default: 'web' } },
      });
    });

    it('should try values file names in order and skip charts without one', async () => {
      await writeFileTree(testDir, {
        'a/Chart.yaml': 'name: a\n',
        'a/values.yml': 'port: 80\n',
        'b/Chart.yaml': 'name: b\n',
      });

      const exitCode = await runGenerate(
        { valuesFiles: ['values.yaml', 'values.yml'], outputFile: 'schema.json' },
        { cwd: testDir, fetcher }
      );

      expect(exitCode).toBe(0);
      expect(existsSync(join(testDir, 'a/schema.json'))).toBe(true);
      expect(existsSync(join(testDir, 'b/schema.json'))).toBe(false);
      expect(env.capturedError).toContainEqual(
        expect.stringContaining(`No values file found in ${join(testDir, 'b')} (tried: values.yaml, values.yml)`)
      );
    });

    it('should apply settings from the config file', async () => {
      await writeFileTree(testDir, {
        'values-schema.config.yaml': 'chartSearchRoot: charts\noutputFile: out.json\nskipAutoGeneration: [default]\n',
        ...chartFiles('charts/app', 'replicaCount: 1\n'),
        ...chartFiles('other', 'replicaCount: 1\n'),
      });

      const exitCode = await runGenerate({}, { cwd: testDir, fetcher });

      expect(exitCode).toBe(0);
      expect(existsSync(join(testDir, 'other/out.json'))).toBe(false);
      expect(await readJson(join(testDir, 'charts/app/out.json'))).toMatchObject({
        properties: { replicaCount: { type: 'integer', title: 'replicaCount' } },
      });
      expect(JSON.stringify(await readJson(join(testDir, 'charts/app/out.json')))).not.toContain('"default"');
    });

    it('should stop at the first failing chart', async () => {
      await writeFileTree(testDir, {
        ...chartFiles('a', '# @schema\n# type: string\nname: web\n'),
        ...chartFiles('b', 'name: web\n'),
      });

      const exitCode = await runGenerate({}, { cwd: testDir, fetcher });

      expect(exitCode).toBe(1);
      expect(existsSync(join(testDir, 'b/values.schema.json'))).toBe(false);
      expect(env.capturedError).toContainEqual(
        expect.stringContaining(`❌ Invalid schema annotation: ${join('a', 'values.yaml')}`)
      );
    });

    it('should report invalid skip fields', async () => {
      await writeFileTree(testDir, chartFiles('app', 'name: web\n'));

      const exitCode = await runGenerate({ skipAutoGeneration: ['color'] }, { cwd: testDir, fetcher });

      expect(exitCode).toBe(1);
      expect(env.capturedError).toContainEqual(
        expect.stringContaining("unsupported field names 'color' for skipping auto-generation")
      );
    });

    it('should report an invalid config file', async () => {
      await writeFileTree(testDir, { 'values-schema.config.yaml': 'keepFullComment: "yes"\n' });

      const exitCode = await runGenerate({}, { cwd: testDir, fetcher });

      expect(exitCode).toBe(1);
      expect(env.capturedError).toContainEqual(
        expect.stringContaining('• keepFullComment: Expected boolean, received string')
      );
    });

    it('should fail when the search root does not exist', async () => {
      expect(await runGenerate({ chartSearchRoot: 'missing' }, { cwd: testDir, fetcher })).toBe(1);
    });

    it('should succeed with a warning when there are no charts', async () => {
      expect(await runGenerate({}, { cwd: testDir, fetcher })).toBe(0);
      expect(env.capturedError).toContainEqual(expect.stringContaining(`No charts found below ${testDir}`));
    });

    it('should download a remote schema once for all charts', async () => {
      const url = 'https://schemas.test/port.json';
      fetcher = new FakeSchemaFetcher({ [url]: JSON.stringify({ type: 'integer', minimum: 1 }) });
      const values = `# @schema\n# $ref: ${url}\n# @schema\nport: 80\n`;
      await writeFileTree(testDir, { ...chartFiles('a', values), ...chartFiles('b', values) });

      const exitCode = await runGenerate({ resolveRemote: true }, { cwd: testDir, fetcher });

      expect(exitCode).toBe(0);
      expect(fetcher.requested).toEqual([url]);
      expect(await readJson(join(testDir, 'b/values.schema.json'))).toMatchObject({
        properties: { port: { $ref: '#/definitions/schemas_test_port_json' } },
        definitions: { schemas_test_port_json: { type: 'integer', minimum: 1 } },
      });
    });
  });

  describe('command registration', () => {
    beforeEach(() => {
      vi.spyOn(process, 'cwd').mockReturnValue(testDir);
    });

    it('should run as the default command', async () => {
      await writeFileTree(testDir, chartFiles('app', 'name: web\n'));
      generateCommand(env.program);

      await env.program.parseAsync(['--dry-run'], { from: 'user' });

      expect(existsSync(join(testDir, 'app/values.schema.json'))).toBe(false);
      expect(JSON.parse(env.capturedLog[0] ?? '')).toMatchObject({ properties: { name: { default: 'web' } } });
    });

    it('should parse comma-separated flags', async () => {
      await writeFileTree(testDir, chartFiles('app', 'name: web\n'));
      generateCommand(env.program);

      await env.program.parseAsync(['generate', '-k', 'title,description', '-d'], { from: 'user' });

      expect(JSON.parse(env.capturedLog[0] ?? '')).toMatchObject({
        properties: { name: { type: 'string', default: 'web' } },
      });
      expect(env.capturedLog[0]).not.toContain('"title"');
    });

    it('should exit with code 1 on failure', async () => {
      await writeFileTree(testDir, chartFiles('app', 'name: !vault secret\n'));
      generateCommand(env.program);

      await expect(env.program.parseAsync(['generate'], { from: 'user' })).rejects.toThrow('process.exit(1)');
    });

    it('should reject unknown log levels', async () => {
      generateCommand(env.program);

      await expect(env.program.parseAsync(['generate', '--log-level', 'loud'], { from: 'user' })).rejects.toThrow();
    });
  });
});

describe('option parsers', () => {
  it('should split comma lists and append to earlier values', () => {
    expect(parseCommaList('title, default,')).toEqual(['title', 'default']);
    expect(parseCommaList('b', ['a'])).toEqual(['a', 'b']);
  });

  it('should accept only positive integers', () => {
    expect(parsePositiveInteger('250')).toBe(250);
    expect(() => parsePositiveInteger('0')).toThrow('Must be a positive integer.');
    expect(() => parsePositiveInteger('1.5')).toThrow('Must be a positive integer.');
  });
});
