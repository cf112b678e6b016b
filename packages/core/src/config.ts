// ============================================================================
// @structpack/core — Encoder Configuration
// ============================================================================

import { z } from 'zod';
import type { DateEncodingStrategy, DateFormatter, DateTransform } from './date_strategy.js';
import { ConfigurationError } from './errors.js';

export const DEFAULT_MAX_DEPTH = 512;

/**
 * Options accepted by `MessagePackEncoder` and `encode()`.
 */
export interface EncoderOptions {
  /** How `Date` values are written. Defaults to `deferred`. */
  dateEncodingStrategy?: DateEncodingStrategy;
  /** Application context visible to every value through `encoder.userInfo`. */
  userInfo?: Record<string, unknown> | ReadonlyMap<string, unknown>;
  /** Deepest coding path allowed before encoding fails. Defaults to 512. */
  maxDepth?: number;
}

/**
 * Options after validation and defaulting. Shared read-only by every encoder
 * node of one encode call.
 */
export interface ResolvedEncoderOptions {
  readonly dateEncodingStrategy: DateEncodingStrategy;
  readonly userInfo: ReadonlyMap<string, unknown>;
  readonly maxDepth: number;
}

// ---- Schema ----

function isDateFormatter(value: unknown): value is DateFormatter {
  return (
    typeof value === 'object' && value !== null && 'format' in value && typeof value.format === 'function'
  );
}

function isDateTransform(value: unknown): value is DateTransform {
  return typeof value === 'function';
}

const dateStrategySchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('deferred') }),
  z.object({ kind: z.literal('iso8601') }),
  z.object({ kind: z.literal('secondsSince1970') }),
  z.object({ kind: z.literal('millisecondsSince1970') }),
  z.object({
    kind: z.literal('formatter'),
    formatter: z.custom<DateFormatter>(isDateFormatter, 'formatter must have a format(date) method'),
  }),
  z.object({
    kind: z.literal('custom'),
    transform: z.custom<DateTransform>(isDateTransform, 'transform must be a function'),
  }),
]);

const encoderOptionsSchema = z
  .object({
    dateEncodingStrategy: dateStrategySchema.default({ kind: 'deferred' }),
    userInfo: z.union([z.map(z.string(), z.unknown()), z.record(z.unknown())]).optional(),
    maxDepth: z.number().int().positive().default(DEFAULT_MAX_DEPTH),
  })
  .strict();

/**
 * Validate options and fill in defaults.
 *
 * @throws ConfigurationError listing every invalid field
 */
export function resolveOptions(options: EncoderOptions = {}): ResolvedEncoderOptions {
  const result = encoderOptionsSchema.safeParse(options);
  if (!result.success) {
    throw new ConfigurationError(
      result.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`),
    );
  }

  const { dateEncodingStrategy, userInfo, maxDepth } = result.data;
  const info =
    userInfo === undefined
      ? new Map<string, unknown>()
      : userInfo instanceof Map
        ? new Map(userInfo)
        : new Map(Object.entries(userInfo));

  return Object.freeze({ dateEncodingStrategy, userInfo: info, maxDepth });
}
