export {
  buildLogEntry,
  categoryOf,
  resolveResult,
  DEFAULT_LEVEL,
  DEFAULT_SERVICE,
} from './services/LogEntryBuilder.js';
export { LogWriter, DEFAULT_INDEX_PREFIX } from './services/LogWriter.js';
export type { LogWriterOptions, SubmitMode } from './services/LogWriter.js';
export type { IIndexClient } from './providers/IIndexClient.js';
export { ElasticsearchIndexClient } from './providers/ElasticsearchIndexClient.js';
export type {
  ElasticsearchConnectOptions,
  ElasticsearchTransport,
} from './providers/ElasticsearchIndexClient.js';
export type { ILogProvider, LogEvent, LogLevel } from './providers/ILogProvider.js';
export { ConsoleLogProvider } from './providers/ConsoleLogProvider.js';
export { AppError, ConfigurationError, ValidationError } from './errors.js';
export { loadConfig, DEFAULT_CONFIG } from './config.js';
export type { WriterConfig } from './config.js';
export { createContainer } from './container.js';
export type { Container } from './container.js';
export { getProductionContainer, disposeProductionContainer } from './container.production.js';
export { LOG_CATEGORIES } from './types/models.js';
export type {
  LogCategory,
  CommonFields,
  ProcessFields,
  CommonLogParams,
  ProcessLogParams,
  LogEntryParams,
  LogDocument,
  IndexAck,
} from './types/models.js';
