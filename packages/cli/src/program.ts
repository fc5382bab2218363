/**
 * Program factory, shared by the executable and the command tests
 */

import { Command } from 'commander';

import { configCommand } from './commands/config.js';
import { generateCommand } from './commands/generate.js';

export function createProgram(version: string): Command {
  const program = new Command();

  program
    .name('values-schema')
    .description('Generate values.schema.json for Helm charts from annotated values.yaml files')
    .version(version);

  generateCommand(program); // values-schema generate (default)
  configCommand(program); // values-schema config

  return program;
}
