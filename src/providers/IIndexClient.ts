/**
 * Datastore handle interface.
 * One instance backs each submission path of the log writer.
 */

import type { IndexAck, LogDocument } from '../types/models.js';

export interface IIndexClient {
  /** Write one document into the named index and return the datastore's acknowledgement. */
  index(indexName: string, document: LogDocument): Promise<IndexAck>;

  /** Release the underlying connections. */
  close(): Promise<void>;
}
