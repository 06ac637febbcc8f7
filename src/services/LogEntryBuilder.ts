/**
 * Log entry construction.
 * Collapses submission parameters into the flat document shape stored in
 * the datastore. Only the selected category's field group is copied.
 */

import type {
  CommonFields,
  LogCategory,
  LogDocument,
  LogEntryParams,
  ProcessFields,
} from '../types/models.js';

export const DEFAULT_LEVEL = 'INFO';
export const DEFAULT_SERVICE = 'python-app';

const RESULT_SUCCESS = 'success';
const RESULT_FAILURE = 'failure';

/** The category an entry is filed under; omitted means `common`. */
export function categoryOf(params: LogEntryParams): LogCategory {
  return params.category ?? 'common';
}

/**
 * Build the document for one log call.
 * `extra` is merged last and wins over every built key, `@timestamp` included.
 */
export function buildLogEntry(params: LogEntryParams, now: Date = new Date()): LogDocument {
  const entry: LogDocument = {
    '@timestamp': now.toISOString(),
    message: params.message,
    level: params.level ?? DEFAULT_LEVEL,
    service: params.service ?? DEFAULT_SERVICE,
  };

  if (params.category === 'process') {
    appendProcessFields(entry, params.fields);
  } else {
    appendCommonFields(entry, params.fields);
  }

  if (params.extra) {
    mergeExtra(entry, params.extra);
  }

  return entry;
}

function appendCommonFields(entry: LogDocument, fields: CommonFields | undefined): void {
  if (!fields) return;
  setIfPresent(entry, 'logger', fields.logger);
  setIfPresent(entry, 'environment', fields.environment);
}

function appendProcessFields(entry: LogDocument, fields: ProcessFields | undefined): void {
  if (!fields) return;
  setIfPresent(entry, 'model', fields.model);
  setIfPresent(entry, 'method', fields.method);
  setIfPresent(entry, 'action', fields.action);
  setIfPresent(entry, 'expected_value', fields.expectedValue);
  setIfPresent(entry, 'actual_value', fields.actualValue);
  setIfPresent(entry, 'result', resolveResult(fields));
}

/** Explicit result wins; otherwise compare expected against actual. */
export function resolveResult(fields: ProcessFields): string | undefined {
  if (fields.result !== undefined) return fields.result;
  if (fields.expectedValue === undefined || fields.actualValue === undefined) {
    return undefined;
  }
  return fields.expectedValue === fields.actualValue ? RESULT_SUCCESS : RESULT_FAILURE;
}

/** Own-property writes, so a `__proto__` key from parsed JSON lands as data. */
function mergeExtra(entry: LogDocument, extra: Record<string, unknown>): void {
  for (const [key, value] of Object.entries(extra)) {
    Object.defineProperty(entry, key, {
      value,
      enumerable: true,
      writable: true,
      configurable: true,
    });
  }
}

function setIfPresent(entry: LogDocument, key: string, value: string | undefined): void {
  if (value !== undefined) {
    entry[key] = value;
  }
}
