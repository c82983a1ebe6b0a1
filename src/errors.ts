/**
 * Application error hierarchy.
 * Every failure a stage raises on purpose is an AppError with a stable code;
 * anything else reaching the run command is treated as a bug.
 */

export type ErrorCode =
  | 'INVALID_ARGUMENT'
  | 'SERVICE_UNAVAILABLE'
  | 'UPSTREAM_ERROR'
  | 'TREE_FORMAT'
  | 'NOT_FOUND';

export class AppError extends Error {
  constructor(
    readonly code: ErrorCode,
    message: string,
    readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = new.target.name;
  }
}

/** Caller supplied unusable input. Raised before any I/O. */
export class InvalidArgumentError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('INVALID_ARGUMENT', message, details);
  }
}

/** A whole stage produced no usable data; the pipeline cannot continue. */
export class ServiceUnavailableError extends AppError {
  constructor(service: string, message: string, details?: Record<string, unknown>) {
    super('SERVICE_UNAVAILABLE', `${service}: ${message}`, { service, ...details });
  }
}

/** A single call to an external service failed (status, transport or payload). */
export class UpstreamError extends AppError {
  constructor(
    readonly service: string,
    message: string,
    readonly status?: number
  ) {
    super('UPSTREAM_ERROR', `${service} error${status ? ` (${status})` : ''}: ${message}`, {
      service,
      ...(status !== undefined && { status }),
    });
  }
}

export class TreeFormatError extends AppError {
  constructor(message: string, readonly position?: number) {
    super('TREE_FORMAT', message, position !== undefined ? { position } : undefined);
  }
}

export class NotFoundError extends AppError {
  constructor(message: string) {
    super('NOT_FOUND', message);
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
