/**
 * Pipeline Error Taxonomy
 *
 * Every error the pipeline raises on purpose extends PipelineError and
 * carries a `kind` discriminator so callers can branch without instanceof
 * chains across module boundaries.
 *
 * - transient_external_failure: network, timeout or rate limit on an external
 *   service; retried with backoff, bounded
 * - malformed_response: the service answered but the payload failed
 *   structural validation; retried like a transient failure, logged apart
 * - systemic_failure: the consecutive-failure threshold was crossed; aborts the
 *   current stage without persisting partial results
 * - corrupt_checkpoint: a checkpoint file could not be read; requires reset
 * - configuration: invalid arguments or environment; raised before any work
 *
 * @module errors
 */

export type PipelineErrorKind =
  | 'transient_external_failure'
  | 'malformed_response'
  | 'systemic_failure'
  | 'corrupt_checkpoint'
  | 'configuration';

/**
 * Base class for all pipeline errors.
 */
export abstract class PipelineError extends Error {
  abstract readonly kind: PipelineErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * Network, timeout or rate-limit failure talking to an external service.
 */
export class TransientExternalError extends PipelineError {
  readonly kind = 'transient_external_failure' as const;
  readonly statusCode?: number;
  /** Whether repeating the same request may succeed */
  readonly isRetryable: boolean;

  constructor(
    message: string,
    options: { statusCode?: number; isRetryable?: boolean; cause?: unknown } = {}
  ) {
    super(message, { cause: options.cause });
    this.statusCode = options.statusCode;
    this.isRetryable = options.isRetryable ?? true;
  }
}

/**
 * A response that arrived but could not be used.
 */
export class MalformedResponseError extends PipelineError {
  readonly kind = 'malformed_response' as const;
}

/**
 * Raised when consecutive external failures indicate an outage.
 */
export class SystemicFailureError extends PipelineError {
  readonly kind = 'systemic_failure' as const;

  constructor(
    message: string,
    public readonly consecutiveFailures: number,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

/**
 * A checkpoint file exists but is unreadable or structurally invalid.
 */
export class CorruptCheckpointError extends PipelineError {
  readonly kind = 'corrupt_checkpoint' as const;

  constructor(
    public readonly checkpointPath: string,
    detail: string,
    options?: { cause?: unknown }
  ) {
    super(
      `Checkpoint ${checkpointPath} is corrupt (${detail}). ` +
        'Run "lexibatch checkpoint reset" to discard it.',
      options
    );
  }
}

/**
 * Invalid configuration or CLI arguments.
 */
export class ConfigurationError extends PipelineError {
  readonly kind = 'configuration' as const;
}

/**
 * Type guard for pipeline errors.
 */
export function isPipelineError(error: unknown): error is PipelineError {
  return error instanceof PipelineError;
}

/**
 * Errors raised when an AbortSignal fires during a sleep or request.
 */
export function isAbortError(error: unknown): boolean {
  return error instanceof Error && error.name === 'AbortError';
}

/**
 * Extract a printable message from an unknown thrown value.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
