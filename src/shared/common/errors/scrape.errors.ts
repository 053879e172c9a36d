import { errors as playwrightErrors } from 'playwright';

export enum ScrapeErrorKind {
  UNKNOWN_TASK = 'UnknownTask',
  INVALID_LEVEL = 'InvalidLevel',
  INVALID_PARAMS = 'InvalidParams',
  NAVIGATION_FAILURE = 'NavigationFailure',
  QUEUE_FULL = 'QueueFull',
  NOT_FOUND = 'NotFound',
  TIMEOUT = 'Timeout',
  INTERNAL = 'Internal',
}

export interface ClassifiedError {
  kind: ScrapeErrorKind;
  message: string;
}

/**
 * Base class for every error the service raises on purpose.
 * The kind travels with the error up to the job record or the HTTP layer.
 */
export abstract class ScrapeError extends Error {
  abstract readonly kind: ScrapeErrorKind;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class UnknownTaskError extends ScrapeError {
  readonly kind = ScrapeErrorKind.UNKNOWN_TASK;

  constructor(readonly taskName: string) {
    super(`Unknown task '${taskName}'`);
  }
}

export class InvalidLevelError extends ScrapeError {
  readonly kind = ScrapeErrorKind.INVALID_LEVEL;

  constructor(readonly level: unknown) {
    super(
      `Extraction level must be an integer between 1 and 4, got ${JSON.stringify(level)}`,
    );
  }
}

export class InvalidParamsError extends ScrapeError {
  readonly kind = ScrapeErrorKind.INVALID_PARAMS;

  constructor(readonly violations: string[]) {
    super(`Invalid task parameters: ${violations.join('; ')}`);
  }
}

export class NavigationFailureError extends ScrapeError {
  readonly kind = ScrapeErrorKind.NAVIGATION_FAILURE;

  constructor(
    readonly url: string,
    reason: string,
  ) {
    super(`Navigation to ${url} failed: ${reason}`);
  }
}

export class QueueFullError extends ScrapeError {
  readonly kind = ScrapeErrorKind.QUEUE_FULL;

  constructor(readonly maxQueueDepth: number) {
    super(`Job queue is full (${maxQueueDepth} jobs waiting)`);
  }
}

/** The pool has stopped taking work; reported like a full queue. */
export class QueueClosedError extends ScrapeError {
  readonly kind = ScrapeErrorKind.QUEUE_FULL;

  constructor() {
    super('Job queue is closed, the service is shutting down');
  }
}

export class JobNotFoundError extends ScrapeError {
  readonly kind = ScrapeErrorKind.NOT_FOUND;

  constructor(readonly jobId: string) {
    super(`Job ${jobId} not found`);
  }
}

export class JobTimeoutError extends ScrapeError {
  readonly kind = ScrapeErrorKind.TIMEOUT;

  constructor(
    readonly jobId: string,
    readonly timeoutMs: number,
  ) {
    super(`Job ${jobId} timed out after ${Math.round(timeoutMs / 1000)}s`);
  }
}

export class UpstreamRequestError extends ScrapeError {
  readonly kind: ScrapeErrorKind;

  constructor(
    readonly statusCode: number,
    message: string,
  ) {
    super(message);
    this.kind =
      statusCode === 404 ? ScrapeErrorKind.NOT_FOUND : ScrapeErrorKind.INTERNAL;
  }
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}

export function classifyError(error: unknown): ClassifiedError {
  if (error instanceof ScrapeError) {
    return { kind: error.kind, message: error.message };
  }

  if (error instanceof playwrightErrors.TimeoutError) {
    return {
      kind: ScrapeErrorKind.NAVIGATION_FAILURE,
      message: error.message,
    };
  }

  return { kind: ScrapeErrorKind.INTERNAL, message: errorMessage(error) };
}
