/**
 * Logging provider interface.
 * Every stage logs through this; the run command decides where events go.
 */

/** Log severity levels, lowest first. */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export const LOG_LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

/** A structured log event. */
export interface LogEvent {
  level: LogLevel;
  /** Human-readable message. */
  message: string;
  /** ISO-8601 timestamp (auto-set if omitted). */
  timestamp?: string;
  /** Arbitrary structured metadata. */
  fields?: Record<string, unknown>;
}

/** Emitted once per outbound page request made by the retriever. */
export interface PageLogEvent extends LogEvent {
  /** 1-based page number requested. */
  page: number;
  /** 1 for the first try, incremented on each retry. */
  attempt: number;
  /** HTTP status, or 0 when the request never produced a response. */
  status: number;
  durationMs: number;
}

export interface ILogProvider {
  log(event: LogEvent): void;

  /** Flush any buffered events. */
  flush(): Promise<void>;

  info(message: string, fields?: Record<string, unknown>): void;
  warn(message: string, fields?: Record<string, unknown>): void;
  error(message: string, fields?: Record<string, unknown>): void;
  debug(message: string, fields?: Record<string, unknown>): void;
}
