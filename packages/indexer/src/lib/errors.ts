/**
 * Indexer-side error taxonomy
 * Upstream failures are the api package's BaseAPIError subclasses.
 */

export abstract class IndexerError extends Error {
  abstract readonly code: string;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = this.constructor.name;
  }
}

/**
 * The analytical store could not complete an operation
 */
export class StoreUnavailableError extends IndexerError {
  readonly code = 'STORE_UNAVAILABLE';

  constructor(public readonly operation: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Store operation "${operation}" failed: ${reason}`, { cause });
  }
}

/**
 * The scheduler could not start or stop
 */
export class SchedulingError extends IndexerError {
  readonly code = 'SCHEDULING_ERROR';
}

/**
 * A fetch-and-store run failed as a whole
 */
export class DataPipelineError extends IndexerError {
  readonly code = 'DATA_PIPELINE_ERROR';

  constructor(message: string, public readonly stage: 'fetch' | 'store', cause?: unknown) {
    super(message, { cause });
  }
}
