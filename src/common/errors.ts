/**
 * Error taxonomy for the ingestion pipeline.
 * `retryable` decides whether the dispatcher schedules another attempt.
 */
export abstract class PipelineError extends Error {
  abstract readonly retryable: boolean;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Bad or missing signature on an inbound notification. Rejected at the boundary. */
export class AuthError extends PipelineError {
  readonly retryable = false;
}

/** Payload shape the normalizer does not understand. Never retried. */
export class MalformedPayloadError extends PipelineError {
  readonly retryable = false;
}

/** The entity store could not be reached; the whole event is retried. */
export class StoreUnavailableError extends PipelineError {
  readonly retryable = true;
}

/** Timeout, rate limit or outage on the analysis side; only that commit is retried. */
export class AnalysisTransientError extends PipelineError {
  readonly retryable = true;
}

export class AnalysisPermanentError extends PipelineError {
  readonly retryable = false;
}

export function errorMessage(err: unknown): string {
  if (err instanceof PipelineError) return `${err.name}: ${err.message}`;
  if (err instanceof Error) return err.message;
  return String(err);
}
