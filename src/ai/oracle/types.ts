/**
 * Generation Oracle Types
 *
 * The oracle is the only non-deterministic collaborator of the pipeline: a
 * stateless request/response service that turns a prompt into structured
 * content validated against a zod schema. Every failure is classified as
 * transient, malformed or fatal so the retry policy can act on it.
 */

import type { z } from 'zod';

// ============================================================================
// Requests
// ============================================================================

/**
 * Pipeline tasks that call the oracle. Each task can be routed to its own model.
 */
export type OracleTask = 'discover' | 'vote' | 'research' | 'write' | 'edit';

export interface OracleRequest<T> {
  readonly task: OracleTask;
  readonly system: string;
  readonly prompt: string;
  /** Response schema; content that fails it is a malformed response */
  readonly schema: z.ZodType<T, z.ZodTypeDef, unknown>;
  /** Sampling temperature. Gate evaluations pass 0. */
  readonly temperature?: number;
  readonly maxOutputTokens?: number;
}

export interface OracleResponse<T> {
  readonly content: T;
  readonly model?: string;
}

/**
 * Abstract generation service.
 *
 * Implementations must reject with an {@link OracleError} subclass.
 */
export interface GenerationOracle {
  generate<T>(request: OracleRequest<T>): Promise<OracleResponse<T>>;
}

// ============================================================================
// Errors
// ============================================================================

export type OracleErrorKind = 'transient' | 'malformed' | 'fatal';

/**
 * Base class for classified oracle failures.
 */
export abstract class OracleError extends Error {
  abstract readonly kind: OracleErrorKind;

  constructor(message: string, readonly cause?: unknown) {
    super(message);
  }

  /** Transient and malformed failures may succeed on a later attempt. */
  get retryable(): boolean {
    return this.kind !== 'fatal';
  }
}

/**
 * Rate limits, timeouts, 5xx responses and network failures.
 */
export class TransientOracleError extends OracleError {
  readonly name = 'TransientOracleError';
  readonly kind = 'transient';

  constructor(
    message: string,
    cause?: unknown,
    readonly statusCode?: number
  ) {
    super(message, cause);
  }
}

/**
 * The response could not be parsed or did not match the requested schema.
 */
export class MalformedResponseError extends OracleError {
  readonly name = 'MalformedResponseError';
  readonly kind = 'malformed';

  constructor(
    message: string,
    cause?: unknown,
    readonly issues: readonly string[] = []
  ) {
    super(message, cause);
  }
}

export type FatalOracleReason = 'non-retryable' | 'retries-exhausted';

/**
 * Invalid credentials, rejected requests, unknown failures, or any retryable
 * failure that survived every attempt.
 */
export class FatalOracleError extends OracleError {
  readonly name = 'FatalOracleError';
  readonly kind = 'fatal';

  constructor(
    message: string,
    readonly reason: FatalOracleReason,
    readonly attempts: number,
    cause?: unknown
  ) {
    super(message, cause);
  }
}

export function isOracleError(error: unknown): error is OracleError {
  return error instanceof OracleError;
}

export function isFatalOracleError(error: unknown): error is FatalOracleError {
  return error instanceof FatalOracleError;
}
