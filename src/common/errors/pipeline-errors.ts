/**
 * Pipeline Errors
 * Typed failures raised by the chat pipeline and its capability adapters.
 *
 * Permanent errors are never retried. Retryable errors are retried by
 * ResilienceService before being surfaced as UpstreamServiceError.
 */

/**
 * Base class for all pipeline errors
 */
export abstract class PipelineError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly retryable: boolean,
  ) {
    super(message);
    this.name = this.constructor.name;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * Missing or invalid setup (credentials, unreachable index, bad env values).
 * The service refuses to start when this is raised during bootstrap.
 */
export class ConfigurationError extends PipelineError {
  constructor(
    message: string,
    public readonly keys: string[] = [],
  ) {
    super(message, 'CONFIGURATION_INVALID', false);
  }
}

/**
 * A named external capability failed after exhausting retries,
 * or failed with a permanent classification.
 */
export class UpstreamServiceError extends PipelineError {
  constructor(
    public readonly service: string,
    message: string,
    public readonly status?: number,
    public readonly originalError?: unknown,
  ) {
    super(message, 'UPSTREAM_SERVICE_FAILED', false);
  }
}

/**
 * Normalized request values outside their accepted range
 */
export class PipelineValidationError extends PipelineError {
  constructor(
    message: string,
    public readonly field: string,
  ) {
    super(message, 'PIPELINE_INVALID_INPUT', false);
  }
}

/**
 * A single capability attempt exceeded its timeout
 */
export class CapabilityTimeoutError extends PipelineError {
  constructor(
    public readonly capability: string,
    public readonly timeoutMs: number,
  ) {
    super(
      `${capability} did not respond within ${timeoutMs}ms`,
      'CAPABILITY_TIMEOUT',
      true,
    );
  }
}

/**
 * An upstream answered but the payload did not have the expected shape
 */
export class MalformedResponseError extends PipelineError {
  constructor(
    public readonly capability: string,
    detail: string,
  ) {
    super(
      `Malformed response from ${capability}: ${detail}`,
      'MALFORMED_RESPONSE',
      false,
    );
  }
}
