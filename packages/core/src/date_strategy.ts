// ============================================================================
// @structpack/core — Date Encoding Strategies
// ============================================================================

import type { PathSegment } from './coding_path.js';
import { EncodingError, wrapForeignError } from './errors.js';
import type { MessagePackValue } from './value.js';
import { double, integer, string } from './value.js';

/** Anything with a `format(date)` method, such as `Intl.DateTimeFormat`. */
export interface DateFormatter {
  format(date: Date): string;
}

/** What a custom date transform can see besides the date. */
export interface DateTransformContext {
  readonly codingPath: readonly PathSegment[];
  readonly userInfo: ReadonlyMap<string, unknown>;
}

export type DateTransform = (date: Date, context: DateTransformContext) => unknown;

/**
 * How `Date` values are represented.
 *
 * - `deferred`: the date describes itself, a `double` of epoch milliseconds
 * - `iso8601`: `1970-01-01T19:10:00Z` (UTC, whole seconds)
 * - `secondsSince1970` / `millisecondsSince1970`: integers, truncated toward zero
 * - `formatter`: the string the formatter returns
 * - `custom`: whatever the transform returns, encoded in turn
 */
export type DateEncodingStrategy =
  | { readonly kind: 'deferred' }
  | { readonly kind: 'iso8601' }
  | { readonly kind: 'secondsSince1970' }
  | { readonly kind: 'millisecondsSince1970' }
  | { readonly kind: 'formatter'; readonly formatter: DateFormatter }
  | { readonly kind: 'custom'; readonly transform: DateTransform };

export type DateEncodingKind = DateEncodingStrategy['kind'];

// ---- Constructors ----

export const deferred = (): DateEncodingStrategy => ({ kind: 'deferred' });
export const iso8601 = (): DateEncodingStrategy => ({ kind: 'iso8601' });
export const secondsSince1970 = (): DateEncodingStrategy => ({ kind: 'secondsSince1970' });
export const millisecondsSince1970 = (): DateEncodingStrategy => ({ kind: 'millisecondsSince1970' });

export function formatter(f: DateFormatter): DateEncodingStrategy {
  return { kind: 'formatter', formatter: f };
}

export function custom(transform: DateTransform): DateEncodingStrategy {
  return { kind: 'custom', transform };
}

// ---------------------------------------------------------------------------
// Resolution
// ---------------------------------------------------------------------------

/**
 * Outcome of applying a strategy: either a finished value, or a replacement
 * the caller must encode like any other value.
 */
export type DateResolution =
  | { readonly kind: 'value'; readonly value: MessagePackValue }
  | { readonly kind: 'replacement'; readonly value: unknown };

/** Whether this runtime can produce RFC 3339 timestamps. */
export function supportsIso8601(): boolean {
  return typeof Date.prototype.toISOString === 'function';
}

/** `2024-01-02T03:04:05.678Z` → `2024-01-02T03:04:05Z` */
export function formatIso8601(date: Date): string {
  return date.toISOString().replace(/\.\d{3}Z$/, 'Z');
}

export function resolveDate(
  date: Date,
  strategy: DateEncodingStrategy,
  context: DateTransformContext,
): DateResolution {
  const time = date.getTime();
  if (strategy.kind === 'deferred') {
    return { kind: 'value', value: double(time) };
  }

  const path = context.codingPath;
  if (Number.isNaN(time)) {
    throw new EncodingError('invalidValue', 'Invalid Date cannot be encoded', { path, value: date });
  }

  switch (strategy.kind) {
    case 'iso8601':
      if (!supportsIso8601()) {
        throw new EncodingError('capabilityUnavailable', 'ISO 8601 date formatting is not available', {
          path,
          value: date,
        });
      }
      return { kind: 'value', value: string(formatIso8601(date)) };
    case 'secondsSince1970':
      return { kind: 'value', value: integer(Math.trunc(time / 1000)) };
    case 'millisecondsSince1970':
      return { kind: 'value', value: integer(Math.trunc(time)) };
    case 'formatter':
      try {
        return { kind: 'value', value: string(strategy.formatter.format(date)) };
      } catch (err) {
        throw wrapForeignError(err, path, date);
      }
    case 'custom':
      try {
        return { kind: 'replacement', value: strategy.transform(date, context) };
      } catch (err) {
        throw wrapForeignError(err, path, date);
      }
  }
}
