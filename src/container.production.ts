/**
 * Production container: two Elasticsearch handles built from the environment.
 */

import { createContainer, type Container } from './container.js';
import { loadConfig, type WriterConfig } from './config.js';
import { ElasticsearchIndexClient } from './providers/ElasticsearchIndexClient.js';
import { ConsoleLogProvider } from './providers/ConsoleLogProvider.js';

let cached: Container | null = null;

export function getProductionContainer(config: WriterConfig = loadConfig()): Container {
  if (cached) return cached;

  const connectOptions = {
    hosts: config.hosts,
    timeoutSeconds: config.timeoutSeconds,
  };

  cached = createContainer({
    blockingClient: ElasticsearchIndexClient.connect(connectOptions),
    nonBlockingClient: ElasticsearchIndexClient.connect(connectOptions),
    logProvider: new ConsoleLogProvider({ outputToConsole: true, minLevel: 'info' }),
    indexPrefix: config.indexPrefix,
  });

  return cached;
}

/** Close the cached writer's handles and forget the container. */
export async function disposeProductionContainer(): Promise<void> {
  if (!cached) return;
  const { logWriter } = cached;
  cached = null;
  await logWriter.close();
}
