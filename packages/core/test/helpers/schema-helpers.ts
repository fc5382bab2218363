/**
 * Shared helpers for core tests
 */

import { createLogger, type Logger, type LogLevel } from '@values-schema/utils';

import { RemoteSchemaError } from '../../src/errors.js';
import type { SchemaFetcher } from '../../src/remote-store.js';

/**
 * In-memory fetcher: known URLs return their body, everything else is a 404
 */
export class FakeSchemaFetcher implements SchemaFetcher {
  readonly requested: string[] = [];

  constructor(private readonly bodies: Record<string, string>) {}

  async fetchText(url: string): Promise<string> {
    this.requested.push(url);
    const body = this.bodies[url];
    if (body === undefined) {
      throw new RemoteSchemaError(url, 'HTTP 404', 404);
    }
    return body;
  }
}

/**
 * Logger that records formatted lines without the timestamp prefix
 *
 * @example
 * ```typescript
 * const { logger, lines } = captureLogger();
 * logger.warn('reference', 'boom');
 * lines; // ['[WARN] [reference] boom']
 * ```
 */
export function captureLogger(level: LogLevel = 'warn'): { logger: Logger; lines: string[] } {
  const lines: string[] = [];
  const logger = createLogger({
    level,
    write: (line) => lines.push(line.replace(/^\[[^\]]+\] /, '')),
  });
  return { logger, lines };
}
