/**
 * Writer configuration.
 * The core takes plain options; only the production container reads the
 * environment, through loadConfig().
 */

import { ValidationError } from './errors.js';
import { DEFAULT_INDEX_PREFIX } from './services/LogWriter.js';

export interface WriterConfig {
  /** Datastore endpoints shared by both handles. */
  hosts: string[];
  indexPrefix: string;
  /** Per-request timeout for both handles. */
  timeoutSeconds: number;
}

export const DEFAULT_CONFIG: WriterConfig = {
  hosts: ['http://localhost:9200'],
  indexPrefix: DEFAULT_INDEX_PREFIX,
  timeoutSeconds: 30,
};

/**
 * Read configuration from environment variables, falling back to defaults:
 *   ELASTICSEARCH_HOSTS            comma-separated endpoint list
 *   LOG_INDEX_PREFIX               index prefix (may be set to empty)
 *   ELASTICSEARCH_TIMEOUT_SECONDS  positive number
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): WriterConfig {
  return {
    hosts: parseHosts(env.ELASTICSEARCH_HOSTS),
    indexPrefix: env.LOG_INDEX_PREFIX ?? DEFAULT_CONFIG.indexPrefix,
    timeoutSeconds: parseTimeout(env.ELASTICSEARCH_TIMEOUT_SECONDS),
  };
}

function parseHosts(raw: string | undefined): string[] {
  if (raw === undefined) return [...DEFAULT_CONFIG.hosts];

  const hosts = raw
    .split(',')
    .map((h) => h.trim())
    .filter((h) => h.length > 0);

  if (hosts.length === 0) {
    throw new ValidationError('ELASTICSEARCH_HOSTS must list at least one host', {
      value: raw,
    });
  }
  return hosts;
}

function parseTimeout(raw: string | undefined): number {
  if (raw === undefined || raw.trim() === '') return DEFAULT_CONFIG.timeoutSeconds;

  const seconds = Number(raw);
  if (!Number.isFinite(seconds) || seconds <= 0) {
    throw new ValidationError('ELASTICSEARCH_TIMEOUT_SECONDS must be a positive number', {
      value: raw,
    });
  }
  return seconds;
}
