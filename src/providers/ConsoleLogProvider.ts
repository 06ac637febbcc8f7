/**
 * Console-based diagnostics provider.
 * Keeps accepted events in memory (inspectable in tests) and can echo them
 * to the console method matching their level.
 */

import { LOG_LEVEL_ORDER } from './ILogProvider.js';
import type { ILogProvider, LogEvent, LogLevel } from './ILogProvider.js';

export interface ConsoleLogProviderOptions {
  /** Echo events to the console as they arrive. Default: false. */
  outputToConsole?: boolean;
  /** Events below this level are dropped. Default: 'debug'. */
  minLevel?: LogLevel;
}

export class ConsoleLogProvider implements ILogProvider {
  /** Accepted events, most recent last. */
  readonly events: LogEvent[] = [];

  private readonly outputToConsole: boolean;
  private readonly minLevel: LogLevel;

  constructor(options?: ConsoleLogProviderOptions) {
    this.outputToConsole = options?.outputToConsole ?? false;
    this.minLevel = options?.minLevel ?? 'debug';
  }

  log(event: LogEvent): void {
    if (LOG_LEVEL_ORDER[event.level] < LOG_LEVEL_ORDER[this.minLevel]) return;

    const stamped: LogEvent = {
      ...event,
      timestamp: event.timestamp ?? new Date().toISOString(),
    };
    this.events.push(stamped);

    if (this.outputToConsole) {
      const line = `${stamped.timestamp} [${stamped.level.toUpperCase()}] ${stamped.message}`;
      if (stamped.fields) {
        console[stamped.level](line, stamped.fields);
      } else {
        console[stamped.level](line);
      }
    }
  }

  async flush(): Promise<void> {
    // Console writes are synchronous.
  }

  debug(message: string, fields?: Record<string, unknown>): void {
    this.log({ level: 'debug', message, fields });
  }

  info(message: string, fields?: Record<string, unknown>): void {
    this.log({ level: 'info', message, fields });
  }

  warn(message: string, fields?: Record<string, unknown>): void {
    this.log({ level: 'warn', message, fields });
  }

  error(message: string, fields?: Record<string, unknown>): void {
    this.log({ level: 'error', message, fields });
  }

  clear(): void {
    this.events.length = 0;
  }
}
