#!/usr/bin/env node
/**
 * values-schema CLI entry point
 */

import { readFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';

import { errorMessage } from '@values-schema/core';

import { createProgram } from './program.js';

// Read version from package.json at runtime
const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);
const packageJsonPath = join(__dirname, '../package.json');

function readVersion(): string {
  try {
    const packageJson: unknown = JSON.parse(readFileSync(packageJsonPath, 'utf-8'));
    if (typeof packageJson === 'object' && packageJson !== null && 'version' in packageJson) {
      return String(packageJson.version);
    }
  } catch (error) {
    console.warn(`Warning: Could not read package.json version (${errorMessage(error)}), using fallback`);
  }
  return '0.0.0';
}

await createProgram(readVersion()).parseAsync(process.argv);
