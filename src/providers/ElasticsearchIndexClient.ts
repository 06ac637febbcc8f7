/**
 * Elasticsearch implementation of IIndexClient.
 * A thin pass-through: retries, pooling and the wire protocol belong to
 * @elastic/elasticsearch, and its errors propagate unwrapped.
 */

import { Client } from '@elastic/elasticsearch';
import type { IIndexClient } from './IIndexClient.js';
import type { IndexAck, LogDocument } from '../types/models.js';

export interface ElasticsearchConnectOptions {
  hosts: string[];
  timeoutSeconds: number;
}

/** The slice of the Elasticsearch client this adapter calls. */
export interface ElasticsearchTransport {
  index(params: { index: string; document: LogDocument }): Promise<IndexAck>;
  close(): Promise<void>;
}

export class ElasticsearchIndexClient implements IIndexClient {
  constructor(private readonly client: ElasticsearchTransport) {}

  static connect(options: ElasticsearchConnectOptions): ElasticsearchIndexClient {
    const client = new Client({
      node: options.hosts,
      requestTimeout: options.timeoutSeconds * 1000,
    });
    return new ElasticsearchIndexClient(client);
  }

  async index(indexName: string, document: LogDocument): Promise<IndexAck> {
    return this.client.index({ index: indexName, document });
  }

  async close(): Promise<void> {
    await this.client.close();
  }
}
