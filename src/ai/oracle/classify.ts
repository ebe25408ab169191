/**
 * Oracle Error Classification
 *
 * Maps whatever a provider SDK throws onto the oracle error taxonomy.
 * Structured-output errors from the AI SDK are malformed responses. Status
 * codes win over message patterns; anything unrecognised is fatal.
 */

import { JSONParseError, NoObjectGeneratedError, TypeValidationError } from 'ai';
import { ZodError } from 'zod';

import {
  FatalOracleError,
  MalformedResponseError,
  OracleError,
  TransientOracleError,
} from './types';

// ============================================================================
// Patterns
// ============================================================================

/**
 * Known transient error patterns that should trigger a retry.
 */
const TRANSIENT_ERROR_PATTERNS = [
  // Rate limiting
  /rate.?limit/i,
  /too.?many.?requests/i,
  // Network issues
  /network/i,
  /fetch.*fail/i,
  /ETIMEDOUT/,
  /ECONNRESET/,
  /ECONNREFUSED/,
  /socket.?hang.?up/i,
  /timed?.?out/i,
  // Server errors
  /internal.?server.?error/i,
  /service.?unavailable/i,
  /bad.?gateway/i,
  // Provider load
  /overloaded/i,
  /capacity/i,
  /temporarily/i,
];

/**
 * Output that could not be turned into the requested object. LLM output is
 * non-deterministic, so these can succeed on a later attempt.
 */
const MALFORMED_ERROR_PATTERNS = [
  /did not match schema/i,
  /could not parse/i,
  /no object generated/i,
  /failed to parse/i,
  /invalid json/i,
  /type validation failed/i,
];

const FATAL_STATUS_CODES = new Set([400, 401, 402, 403, 404]);

// ============================================================================
// Helpers
// ============================================================================

function readNumber(source: unknown, key: string): number | undefined {
  if (typeof source !== 'object' || source === null) return undefined;
  const value: unknown = Reflect.get(source, key);
  return typeof value === 'number' ? value : undefined;
}

/**
 * HTTP status carried by the error, if any (`statusCode` on AI SDK
 * APICallError, `status` on fetch-style errors).
 */
export function getStatusCode(error: unknown): number | undefined {
  return readNumber(error, 'statusCode') ?? readNumber(error, 'status');
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function isUnusableOutput(error: unknown): boolean {
  return (
    NoObjectGeneratedError.isInstance(error) ||
    TypeValidationError.isInstance(error) ||
    JSONParseError.isInstance(error)
  );
}

/**
 * Schema issues from the first ZodError in the cause chain, formatted as
 * `path: message`.
 */
function schemaIssues(error: unknown): string[] {
  let current: unknown = error;
  for (let depth = 0; depth < 4 && current !== undefined; depth++) {
    if (current instanceof ZodError) {
      return current.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
    }
    current = current instanceof Error ? current.cause : undefined;
  }
  return [];
}

function isAbortLike(error: unknown): boolean {
  if (!(error instanceof Error)) return false;
  return error.name === 'TimeoutError' || error.name === 'AbortError';
}

// ============================================================================
// Classification
// ============================================================================

/**
 * Classifies an arbitrary thrown value.
 *
 * Already-classified errors pass through unchanged.
 */
export function classifyOracleError(error: unknown): OracleError {
  if (error instanceof OracleError) return error;

  const message = errorMessage(error);
  if (isUnusableOutput(error)) {
    return new MalformedResponseError(message, error, schemaIssues(error));
  }

  const status = getStatusCode(error);

  if (status !== undefined) {
    if (status === 408 || status === 429 || (status >= 500 && status < 600)) {
      return new TransientOracleError(`Provider returned ${status}: ${message}`, error, status);
    }
    if (FATAL_STATUS_CODES.has(status)) {
      return new FatalOracleError(`Provider rejected request (${status}): ${message}`, 'non-retryable', 1, error);
    }
  }

  if (isAbortLike(error)) {
    return new TransientOracleError(`Oracle call timed out: ${message}`, error);
  }

  if (MALFORMED_ERROR_PATTERNS.some((pattern) => pattern.test(message))) {
    return new MalformedResponseError(message, error);
  }

  if (TRANSIENT_ERROR_PATTERNS.some((pattern) => pattern.test(message))) {
    return new TransientOracleError(message, error);
  }

  return new FatalOracleError(message, 'non-retryable', 1, error);
}
