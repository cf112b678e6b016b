// ============================================================================
// @structpack/core — MessagePack Encoder
// ============================================================================
//
// Public entry point. Every call builds a fresh encoder tree, so nothing
// carries over from one call to the next.
// ============================================================================

import { formatPath } from './coding_path.js';
import { type EncoderOptions, type ResolvedEncoderOptions, resolveOptions } from './config.js';
import type { DateEncodingStrategy } from './date_strategy.js';
import { EncodingError } from './errors.js';
import { logEncode, logEncodeFailure, timer } from './logger.js';
import { pack } from './pack.js';
import { StructureEncoder } from './structure_encoder.js';
import type { MessagePackValue } from './value.js';

/**
 * Encodes values that describe themselves (see `Encodable`) and plain
 * JavaScript data to MessagePack bytes.
 *
 * @example
 * ```ts
 * const encoder = new MessagePackEncoder({ dateEncodingStrategy: iso8601() });
 * const bytes = encoder.encode({ id: 7, createdAt: new Date(0) });
 * ```
 */
export class MessagePackEncoder {
  private readonly options: ResolvedEncoderOptions;

  /** @throws ConfigurationError when `options` are invalid */
  constructor(options: EncoderOptions = {}) {
    this.options = resolveOptions(options);
  }

  get dateEncodingStrategy(): DateEncodingStrategy {
    return this.options.dateEncodingStrategy;
  }

  get userInfo(): ReadonlyMap<string, unknown> {
    return this.options.userInfo;
  }

  /**
   * Encode `value` to the Canonical Value tree without packing it.
   *
   * @throws EncodingError when the value cannot be represented
   */
  encodeToValue(value: unknown): MessagePackValue {
    try {
      return new StructureEncoder(this.options).encodeRoot(value);
    } catch (err) {
      if (err instanceof EncodingError) {
        logEncodeFailure(formatPath(err.path), err.message);
      }
      throw err;
    }
  }

  /**
   * Encode `value` to MessagePack bytes. Either the complete encoding is
   * returned or an error is thrown; there are no partial results.
   *
   * @throws EncodingError when the value cannot be represented
   * @throws EncoderUsageError when a value's `encode` method misuses the encoder
   */
  encode(value: unknown): Uint8Array {
    const t = timer();
    const tree = this.encodeToValue(value);
    const bytes = pack(tree);
    logEncode(tree.kind, bytes.length, t.elapsed());
    return bytes;
  }
}

/**
 * Encode `value` with a one-off encoder.
 */
export function encode(value: unknown, options?: EncoderOptions): Uint8Array {
  return new MessagePackEncoder(options).encode(value);
}
