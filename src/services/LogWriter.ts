/**
 * Dual-mode log writer.
 * Builds one document per call and writes it through one of two datastore
 * handles: `submit` uses the blocking handle, `submitAsync` the
 * non-blocking one. Both handles are opened against the same hosts and
 * share nothing but this writer's read-only configuration.
 *
 * No retries and no error wrapping: a failed write rejects with the
 * client's own error and the document is lost unless the caller resubmits.
 */

import { ConfigurationError } from '../errors.js';
import type { IIndexClient } from '../providers/IIndexClient.js';
import type { ILogProvider } from '../providers/ILogProvider.js';
import type { IndexAck, LogCategory, LogEntryParams } from '../types/models.js';
import { buildLogEntry, categoryOf } from './LogEntryBuilder.js';

export const DEFAULT_INDEX_PREFIX = 'mh-logs';

export type SubmitMode = 'blocking' | 'non-blocking';

export interface LogWriterOptions {
  blockingClient: IIndexClient;
  nonBlockingClient: IIndexClient;
  logProvider: ILogProvider;
  /** Target index is `{indexPrefix}-{category}` unless overridden per call. */
  indexPrefix?: string;
}

export class LogWriter {
  readonly indexPrefix: string;

  private readonly blockingClient: IIndexClient;
  private readonly nonBlockingClient: IIndexClient;
  private readonly logProvider: ILogProvider;
  private closed = false;

  constructor(options: LogWriterOptions) {
    this.blockingClient = options.blockingClient;
    this.nonBlockingClient = options.nonBlockingClient;
    this.logProvider = options.logProvider;
    this.indexPrefix = options.indexPrefix ?? DEFAULT_INDEX_PREFIX;
  }

  /**
   * Destination index for a write.
   * A non-empty override is used verbatim.
   */
  resolveIndex(category: LogCategory, indexOverride?: string): string {
    if (indexOverride) return indexOverride;

    if (!this.indexPrefix) {
      throw new ConfigurationError(
        'No target index: pass an index override or configure an index prefix',
        { category }
      );
    }
    return `${this.indexPrefix}-${category}`;
  }

  /** Write through the blocking handle. */
  async submit(params: LogEntryParams, indexOverride?: string): Promise<IndexAck> {
    return this.write(this.blockingClient, 'blocking', params, indexOverride);
  }

  /** Write through the non-blocking handle. Every failure arrives as a rejection. */
  async submitAsync(params: LogEntryParams, indexOverride?: string): Promise<IndexAck> {
    return this.write(this.nonBlockingClient, 'non-blocking', params, indexOverride);
  }

  /**
   * Close the blocking handle, then the non-blocking one.
   * Both are attempted; a single failure is rethrown as is, two are
   * rethrown together as an AggregateError.
   * The writer counts as closed from the first call, failed or not:
   * later calls return without touching either handle.
   */
  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;

    const failures: unknown[] = [];

    try {
      await this.blockingClient.close();
    } catch (err) {
      failures.push(err);
    }

    try {
      await this.nonBlockingClient.close();
    } catch (err) {
      failures.push(err);
    }

    if (failures.length === 1) throw failures[0];
    if (failures.length > 1) {
      throw new AggregateError(failures, 'Failed to close both datastore handles');
    }

    this.logProvider.info('Log writer closed', { indexPrefix: this.indexPrefix });
  }

  private async write(
    client: IIndexClient,
    mode: SubmitMode,
    params: LogEntryParams,
    indexOverride: string | undefined
  ): Promise<IndexAck> {
    const document = buildLogEntry(params);
    const index = this.resolveIndex(categoryOf(params), indexOverride);

    const ack = await client.index(index, document);

    this.logProvider.debug('Log document indexed', {
      mode,
      index,
      id: ack._id,
      result: ack.result,
    });
    return ack;
  }
}
