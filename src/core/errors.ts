/**
 * Error classes for the deployer.
 *
 * All errors extend {@link DeployerError} which provides:
 * - A machine-readable `code` from the closed {@link ErrorCode} set
 * - An HTTP-compatible `statusCode` for API responses
 *
 * Stage errors ({@link GenerationError}, {@link PublishError}) never reach the
 * caller directly: the orchestrator wraps them in an {@link InternalError}
 * that keeps the original as `cause`.
 *
 * @module errors
 *
 * @example
 * ```typescript
 * import { PublishError, RemoteHostError } from './errors.js';
 *
 * try {
 *   await host.createRepository(name, description);
 * } catch (err) {
 *   if (err instanceof RemoteHostError && err.reason === 'already-exists') {
 *     return host.getRepository(name);
 *   }
 *   throw new PublishError(`Repository creation failed: ${name}`, { cause: err });
 * }
 * ```
 */

export type ErrorCode =
  | 'VALIDATION_ERROR'
  | 'UNAUTHORIZED'
  | 'SERVICE_UNAVAILABLE'
  | 'GENERATION_FAILED'
  | 'PUBLISH_FAILED'
  | 'PUBLISH_CONFLICT'
  | 'CALLBACK_DELIVERY_FAILED'
  | 'REMOTE_HOST_ERROR'
  | 'CONFIGURATION_ERROR'
  | 'INTERNAL_ERROR';

/**
 * Base error class for all deployer errors.
 *
 * @example
 * ```typescript
 * try {
 *   throw new DeployerError('Something went wrong', 'INTERNAL_ERROR', 500);
 * } catch (err) {
 *   if (err instanceof DeployerError) {
 *     console.log(err.code);       // 'INTERNAL_ERROR'
 *     console.log(err.statusCode); // 500
 *   }
 * }
 * ```
 */
export class DeployerError extends Error {
  /**
   * @param message - Human-readable error message
   * @param code - Machine-readable error code for programmatic handling
   * @param statusCode - HTTP status code (default: 500)
   * @param options - Standard error options; `cause` keeps the underlying failure
   */
  constructor(
    message: string,
    public readonly code: ErrorCode,
    public readonly statusCode: number = 500,
    options?: ErrorOptions
  ) {
    super(message, options);
    this.name = 'DeployerError';
  }
}

/**
 * Error thrown when an inbound submission does not match its schema.
 *
 * @statusCode 400
 */
export class ValidationError extends DeployerError {
  constructor(message: string) {
    super(message, 'VALIDATION_ERROR', 400);
    this.name = 'ValidationError';
  }
}

/**
 * Error thrown when the submitted secret is missing from the allow-list,
 * or when no allow-list is configured at all.
 *
 * @statusCode 401
 *
 * @example
 * ```typescript
 * if (accepted.length === 0) {
 *   throw new UnauthorizedError('Unauthorized (no secret configured)');
 * }
 * ```
 */
export class UnauthorizedError extends DeployerError {
  constructor(message: string = 'Unauthorized') {
    super(message, 'UNAUTHORIZED', 401);
    this.name = 'UnauthorizedError';
  }
}

/**
 * Error thrown when a dependency failed to initialize at startup.
 *
 * @statusCode 503
 */
export class ServiceUnavailableError extends DeployerError {
  /**
   * @param dependency - Which dependency is missing (`generator` or `publisher`)
   * @param message - Description returned to the caller
   */
  constructor(
    public readonly dependency: 'generator' | 'publisher',
    message: string
  ) {
    super(message, 'SERVICE_UNAVAILABLE', 503);
    this.name = 'ServiceUnavailableError';
  }
}

/**
 * Error thrown when the generation service fails, times out, or returns
 * nothing usable.
 */
export class GenerationError extends DeployerError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, 'GENERATION_FAILED', 500, options);
    this.name = 'GenerationError';
  }
}

/**
 * Error thrown when a repository operation fails unrecoverably.
 */
export class PublishError extends DeployerError {
  constructor(message: string, options?: ErrorOptions, code: ErrorCode = 'PUBLISH_FAILED') {
    super(message, code, 500, options);
    this.name = 'PublishError';
  }
}

/**
 * Error thrown when a file update is rejected because the content hash the
 * publisher read is no longer the file's current hash.
 *
 * @statusCode 500
 */
export class PublishConflictError extends PublishError {
  constructor(
    public readonly path: string,
    options?: ErrorOptions
  ) {
    super(`Conflict updating ${path}: remote content changed since it was read`, options, 'PUBLISH_CONFLICT');
    this.name = 'PublishConflictError';
  }
}

/**
 * Error recorded when every callback attempt fails. Logged, never thrown to
 * the caller.
 */
export class CallbackDeliveryError extends DeployerError {
  constructor(
    public readonly url: string,
    public readonly attempts: number,
    options?: ErrorOptions
  ) {
    super(`Failed to deliver callback to ${url} after ${attempts} attempts`, 'CALLBACK_DELIVERY_FAILED', 502, options);
    this.name = 'CallbackDeliveryError';
  }
}

/**
 * Why a call to the repository host failed.
 *
 * - `already-exists`: the repository name is taken
 * - `not-found`: the requested object does not exist
 * - `conflict`: the host refused a write because of concurrent state
 * - `rejected`: any other refusal or transport failure
 */
export type RemoteFailureReason = 'already-exists' | 'not-found' | 'conflict' | 'rejected';

/**
 * Error thrown by {@link RepositoryHost} adapters. The publisher branches on
 * `reason`; the HTTP status is kept for logs.
 */
export class RemoteHostError extends DeployerError {
  constructor(
    message: string,
    public readonly reason: RemoteFailureReason,
    public readonly status?: number,
    options?: ErrorOptions
  ) {
    super(message, 'REMOTE_HOST_ERROR', 502, options);
    this.name = 'RemoteHostError';
  }
}

/**
 * Error thrown when a dependency cannot be built from the configuration,
 * e.g. a missing credential.
 */
export class ConfigurationError extends DeployerError {
  constructor(message: string) {
    super(message, 'CONFIGURATION_ERROR', 500);
    this.name = 'ConfigurationError';
  }
}

export type PipelineStage = 'generate' | 'publish';

/**
 * Error returned to the caller when generation or publishing fails. The status
 * code is the same for both stages; `stage` and `cause` tell them apart.
 *
 * @statusCode 500
 */
export class InternalError extends DeployerError {
  constructor(
    public readonly stage: PipelineStage,
    cause: Error
  ) {
    super(`Failed to process request: ${cause.message}`, 'INTERNAL_ERROR', 500, { cause });
    this.name = 'InternalError';
  }
}

/**
 * Normalises an unknown thrown value into an `Error`.
 */
export function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}
