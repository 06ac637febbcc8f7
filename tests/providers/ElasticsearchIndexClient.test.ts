import { describe, it, expect, vi, beforeEach } from 'vitest';
import {
  ElasticsearchIndexClient,
  type ElasticsearchTransport,
} from '../../src/providers/ElasticsearchIndexClient.js';
import type { LogDocument } from '../../src/types/models.js';
import { makeAck } from '../mocks/MockIndexClient.js';

const { clientOptions } = vi.hoisted(() => ({ clientOptions: [] as unknown[] }));

// Capture constructor options instead of building a real transport.
vi.mock('@elastic/elasticsearch', () => ({
  Client: class {
    constructor(options: unknown) {
      clientOptions.push(options);
    }

    async index(): Promise<never> {
      throw new Error('not connected');
    }

    async close(): Promise<void> {}
  },
}));

describe('ElasticsearchIndexClient', () => {
  const indexFn = vi.fn<ElasticsearchTransport['index']>();
  const closeFn = vi.fn<ElasticsearchTransport['close']>();
  let client: ElasticsearchIndexClient;

  beforeEach(() => {
    indexFn.mockReset();
    closeFn.mockReset();
    closeFn.mockResolvedValue(undefined);
    client = new ElasticsearchIndexClient({ index: indexFn, close: closeFn });
  });

  it('should send the index name and document as given', async () => {
    indexFn.mockResolvedValue(makeAck('mh-logs-common', 'abc'));
    const document: LogDocument = { '@timestamp': '2026-03-01T00:00:00.000Z', message: 'm' };

    await client.index('mh-logs-common', document);

    expect(indexFn).toHaveBeenCalledTimes(1);
    expect(indexFn).toHaveBeenCalledWith({ index: 'mh-logs-common', document });
  });

  it('should return the response without transforming it', async () => {
    const ack = makeAck('mh-logs-process', 'xyz');
    indexFn.mockResolvedValue(ack);

    await expect(client.index('mh-logs-process', { message: 'm' })).resolves.toBe(ack);
  });

  it('should propagate transport errors unwrapped', async () => {
    const transportError = new Error('ConnectionError: connect ECONNREFUSED');
    indexFn.mockRejectedValue(transportError);

    await expect(client.index('mh-logs-common', { message: 'm' })).rejects.toBe(transportError);
  });

  it('should close the underlying client', async () => {
    await client.close();
    expect(closeFn).toHaveBeenCalledTimes(1);
  });

  it('should propagate close errors', async () => {
    closeFn.mockRejectedValue(new Error('already closed'));
    await expect(client.close()).rejects.toThrow('already closed');
  });

  it('connect() should pass hosts and a millisecond timeout to the client', async () => {
    clientOptions.length = 0;

    const connected = ElasticsearchIndexClient.connect({
      hosts: ['http://a:9200', 'http://b:9200'],
      timeoutSeconds: 5,
    });

    expect(connected).toBeInstanceOf(ElasticsearchIndexClient);
    expect(clientOptions).toEqual([
      { node: ['http://a:9200', 'http://b:9200'], requestTimeout: 5000 },
    ]);
    await connected.close();
  });

  it('connect() should convert fractional seconds', () => {
    clientOptions.length = 0;

    ElasticsearchIndexClient.connect({ hosts: ['http://localhost:9200'], timeoutSeconds: 2.5 });

    expect(clientOptions).toEqual([{ node: ['http://localhost:9200'], requestTimeout: 2500 }]);
  });
});
