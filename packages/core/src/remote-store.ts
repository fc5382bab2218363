/**
 * Remote schema downloads
 *
 * One store lives for a whole run (all charts), so every URL is downloaded at
 * most once and a failing URL is not retried for every key that references it.
 */

import type { Logger } from '@values-schema/utils';
import { silentLogger } from '@values-schema/utils';

import { errorMessage, RemoteSchemaError } from './errors.js';
import { DEFAULT_REMOTE_TIMEOUT_MS } from './options.js';
import type { Schema } from './schema.js';
import { decodeSchema, parseSchemaText } from './schema-codec.js';

export interface SchemaFetcher {
  /**
   * Return the response body for `url`
   *
   * @throws RemoteSchemaError on transport errors and non-2xx responses
   */
  fetchText(url: string): Promise<string>;
}

export interface HttpFetcherOptions {
  timeoutMs?: number;
}

/**
 * Fetcher backed by the global `fetch`, aborting after `timeoutMs`
 */
export function createHttpSchemaFetcher(options: HttpFetcherOptions = {}): SchemaFetcher {
  const timeoutMs = options.timeoutMs ?? DEFAULT_REMOTE_TIMEOUT_MS;

  return {
    async fetchText(url: string): Promise<string> {
      let response: Response;
      try {
        response = await fetch(url, { signal: AbortSignal.timeout(timeoutMs) });
      } catch (error) {
        throw new RemoteSchemaError(url, errorMessage(error));
      }

      if (!response.ok) {
        await response.body?.cancel();
        throw new RemoteSchemaError(url, `HTTP ${response.status}`, response.status);
      }

      try {
        return await response.text();
      } catch (error) {
        throw new RemoteSchemaError(url, `cannot read response: ${errorMessage(error)}`, response.status);
      }
    },
  };
}

export class RemoteSchemaStore {
  private readonly documents = new Map<string, Schema>();
  private readonly failures = new Map<string, RemoteSchemaError>();

  constructor(
    private readonly fetcher: SchemaFetcher,
    private readonly logger: Logger = silentLogger
  ) {}

  get(url: string): Schema | undefined {
    return this.documents.get(url);
  }

  set(url: string, schema: Schema): void {
    this.documents.set(url, schema);
  }

  /**
   * Download and decode `url` (not cached: call set() with the resolved document)
   *
   * @throws RemoteSchemaError for any download or decode failure; the failure is remembered
   */
  async download(url: string): Promise<Schema> {
    const previous = this.failures.get(url);
    if (previous) {
      throw previous;
    }

    try {
      this.logger.debug('reference', `Downloading schema from ${url}`);
      const body = await this.fetcher.fetchText(url);
      return decodeSchema(parseSchemaText(body, new URL(url).pathname), url);
    } catch (error) {
      const failure = error instanceof RemoteSchemaError ? error : new RemoteSchemaError(url, errorMessage(error));
      this.failures.set(url, failure);
      throw failure;
    }
  }
}
