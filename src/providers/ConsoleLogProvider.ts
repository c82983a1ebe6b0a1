/**
 * Console-based log provider.
 * Keeps every event in memory (tests inspect `events`) and, when enabled,
 * writes events at or above `minLevel` to stderr so stdout stays free for
 * the run summary.
 */

import { LOG_LEVEL_ORDER, type ILogProvider, type LogEvent, type LogLevel } from './ILogProvider.js';

export interface ConsoleLogProviderOptions {
  /** Write events to stderr as they arrive. Default: false. */
  outputToConsole?: boolean;
  /** Lowest level written to the console. Default: 'info'. */
  minLevel?: LogLevel;
}

export class ConsoleLogProvider implements ILogProvider {
  /** All logged events, most recent last. */
  readonly events: LogEvent[] = [];

  private readonly outputToConsole: boolean;
  private readonly minLevel: LogLevel;

  constructor(options?: ConsoleLogProviderOptions) {
    this.outputToConsole = options?.outputToConsole ?? false;
    this.minLevel = options?.minLevel ?? 'info';
  }

  log(event: LogEvent): void {
    const stamped: LogEvent = {
      ...event,
      timestamp: event.timestamp ?? new Date().toISOString(),
    };
    this.events.push(stamped);

    if (this.outputToConsole && LOG_LEVEL_ORDER[stamped.level] >= LOG_LEVEL_ORDER[this.minLevel]) {
      console.error(formatEvent(stamped));
    }
  }

  async flush(): Promise<void> {
    // Events are written synchronously.
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

  debug(message: string, fields?: Record<string, unknown>): void {
    this.log({ level: 'debug', message, fields });
  }

  /** Events at exactly the given level. */
  byLevel(level: LogLevel): LogEvent[] {
    return this.events.filter((e) => e.level === level);
  }

  clear(): void {
    this.events.length = 0;
  }
}

/** `[WARN] message {"k":1}` — fields omitted when absent or empty. */
export function formatEvent(event: LogEvent): string {
  const prefix = `[${event.level.toUpperCase()}]`;
  const hasFields = event.fields && Object.keys(event.fields).length > 0;
  const fieldsStr = hasFields ? ` ${JSON.stringify(event.fields)}` : '';
  return `${prefix} ${event.message}${fieldsStr}`;
}
