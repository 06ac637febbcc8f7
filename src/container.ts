/**
 * Dependency injection container.
 * Wires the log writer from its datastore handles and diagnostics provider.
 * Tests pass in-memory handles; production passes Elasticsearch ones.
 */

import type { IIndexClient } from './providers/IIndexClient.js';
import type { ILogProvider } from './providers/ILogProvider.js';
import { LogWriter } from './services/LogWriter.js';

export interface Container {
  logWriter: LogWriter;
  logProvider: ILogProvider;
}

export function createContainer(deps: {
  blockingClient: IIndexClient;
  nonBlockingClient: IIndexClient;
  logProvider: ILogProvider;
  indexPrefix?: string;
}): Container {
  const logWriter = new LogWriter({
    blockingClient: deps.blockingClient,
    nonBlockingClient: deps.nonBlockingClient,
    logProvider: deps.logProvider,
    indexPrefix: deps.indexPrefix,
  });

  return {
    logWriter,
    logProvider: deps.logProvider,
  };
}
