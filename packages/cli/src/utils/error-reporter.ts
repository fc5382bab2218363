/**
 * Failure reporting shared by the commands
 *
 * Every error class the engine and the config loader raise gets its own
 * headline; the message itself already names the key or file at fault.
 */

import { ConfigError } from '@values-schema/config';
import {
  AnnotationError,
  DefinitionConflictError,
  ReferenceResolutionError,
  SchemaValidationError,
  ValuesStructureError,
  errorMessage,
} from '@values-schema/core';
import type { LogLevel } from '@values-schema/utils';
import chalk from 'chalk';

/**
 * Headline for a failure, by error class
 */
export function failureTitle(error: unknown): string {
  if (error instanceof ValuesStructureError) {
    return 'Invalid values file';
  }
  if (error instanceof AnnotationError) {
    return 'Invalid schema annotation';
  }
  if (error instanceof SchemaValidationError) {
    return 'Invalid schema';
  }
  if (error instanceof DefinitionConflictError) {
    return 'Conflicting definitions';
  }
  if (error instanceof ReferenceResolutionError) {
    return 'Unresolvable reference';
  }
  if (error instanceof ConfigError) {
    return 'Invalid configuration';
  }
  return 'Schema generation failed';
}

/**
 * Plain-text failure report (no ANSI colors)
 *
 * @param location - Values file or config file the failure belongs to
 * @param maxIssues - Config issues listed before the rest are summarized
 */
export function formatFailure(error: unknown, location?: string, maxIssues: number = 5): string[] {
  const title = failureTitle(error);
  const lines = [location === undefined ? `❌ ${title}` : `❌ ${title}: ${location}`, `   ${errorMessage(error)}`];

  if (error instanceof ConfigError) {
    for (const issue of error.issues.slice(0, maxIssues)) {
      lines.push(`   • ${issue}`);
    }
    if (error.issues.length > maxIssues) {
      lines.push(`   ... and ${error.issues.length - maxIssues} more`);
    }
  }

  return lines;
}

/**
 * Print a failure report to stderr
 *
 * The stack trace is added at debug level.
 */
export function displayFailure(error: unknown, location?: string, level: LogLevel = 'info'): void {
  const [headline, ...details] = formatFailure(error, location);
  console.error(chalk.red(headline));
  for (const line of details) {
    console.error(chalk.gray(line));
  }

  if (level === 'debug' && error instanceof Error && error.stack) {
    console.error(chalk.gray(error.stack));
  }
}
