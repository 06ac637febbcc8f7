/**
 * Domain models for structured log entries.
 */

import type { estypes } from '@elastic/elasticsearch';

/** Selects which optional field group an entry carries. */
export type LogCategory = 'common' | 'process';

export const LOG_CATEGORIES: readonly LogCategory[] = ['common', 'process'];

/** Fields attached to general application logs. */
export interface CommonFields {
  logger?: string;
  environment?: string;
}

/** Fields attached to processing/verification logs. */
export interface ProcessFields {
  model?: string;
  method?: string;
  action?: string;
  expectedValue?: string;
  actualValue?: string;
  /** Derived from expectedValue/actualValue when omitted. */
  result?: string;
}

interface BaseLogParams {
  message: string;
  /** Free-form severity label. Default: "INFO". */
  level?: string;
  /** Emitting application. Default: "python-app". */
  service?: string;
  /** Merged over the built entry last; may overwrite any key. */
  extra?: Record<string, unknown>;
}

export interface CommonLogParams extends BaseLogParams {
  category?: 'common';
  fields?: CommonFields;
}

export interface ProcessLogParams extends BaseLogParams {
  category: 'process';
  fields?: ProcessFields;
}

export type LogEntryParams = CommonLogParams | ProcessLogParams;

/**
 * A serialized log entry, as written to the datastore.
 * Always built with `@timestamp`, `message`, `level` and `service`.
 */
export type LogDocument = Record<string, unknown>;

/** Acknowledgement returned by the datastore for a single index write. */
export type IndexAck = estypes.IndexResponse;
