// ============================================================================
// @structpack/core — Error Types
// ============================================================================

import { type PathSegment, formatPath } from './coding_path.js';

/**
 * Base error class for all structpack errors.
 */
export class StructPackError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'StructPackError';
  }
}

// ---------------------------------------------------------------------------
// Encoding Errors
// ---------------------------------------------------------------------------

/** Why a recoverable encoding failure happened. */
export type EncodingErrorReason = 'invalidValue' | 'capabilityUnavailable' | 'transformFailed';

/**
 * Thrown when a value cannot be represented. Data-dependent and recoverable:
 * the caller gets no bytes, but the encoder that produced it is discarded and
 * nothing else is affected.
 */
export class EncodingError extends StructPackError {
  public readonly reason: EncodingErrorReason;
  public readonly path: readonly PathSegment[];
  public readonly value?: unknown;

  constructor(
    reason: EncodingErrorReason,
    message: string,
    options: { path: readonly PathSegment[]; value?: unknown; cause?: unknown },
  ) {
    super(`${message} (at ${formatPath(options.path)})`, { cause: options.cause });
    this.name = 'EncodingError';
    this.reason = reason;
    this.path = options.path;
    this.value = options.value;
  }

  /** The failing location, formatted like `$.employees[2]`. */
  get formattedPath(): string {
    return formatPath(this.path);
  }
}

/**
 * Thrown when the encoding protocol is misused: a second container on one
 * encoder, a second scalar in a single-value container, a second super link,
 * or continuing after a failure. These are programmer errors; the library
 * never catches or wraps them.
 */
export class EncoderUsageError extends StructPackError {
  public readonly path: readonly PathSegment[];

  constructor(message: string, path: readonly PathSegment[] = []) {
    super(path.length > 0 ? `${message} (at ${formatPath(path)})` : message);
    this.name = 'EncoderUsageError';
    this.path = path;
  }
}

// ---------------------------------------------------------------------------
// Wire Errors
// ---------------------------------------------------------------------------

/**
 * Thrown when MessagePack bytes are truncated or malformed.
 */
export class MessagePackDecodeError extends StructPackError {
  public readonly offset: number;

  constructor(message: string, offset: number) {
    super(`${message} at byte ${offset}`);
    this.name = 'MessagePackDecodeError';
    this.offset = offset;
  }
}

// ---------------------------------------------------------------------------
// Configuration Errors
// ---------------------------------------------------------------------------

/**
 * Thrown when encoder options fail validation.
 */
export class ConfigurationError extends StructPackError {
  public readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid encoder options: ${issues.join('; ')}`);
    this.name = 'ConfigurationError';
    this.issues = issues;
  }
}

/**
 * Wrap an error raised by application code so it carries the coding path.
 * Library errors pass through unchanged.
 */
export function wrapForeignError(
  err: unknown,
  path: readonly PathSegment[],
  value?: unknown,
): StructPackError {
  if (err instanceof StructPackError) return err;
  const detail = err instanceof Error ? err.message : String(err);
  return new EncodingError('transformFailed', `Value description failed: ${detail}`, {
    path,
    value,
    cause: err,
  });
}
