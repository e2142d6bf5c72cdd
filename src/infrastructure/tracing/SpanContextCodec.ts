/**
 * @fileoverview Span Context Codec
 * @description
 * Converts a {@link TraceContext} to and from the three plain hex strings
 * that travel inside a message payload:
 *
 * | field        | width    | example                            |
 * |--------------|----------|------------------------------------|
 * | `traceId`    | 32 chars | `4bf92f3577b34da6a3ce929d0e0e4736` |
 * | `spanId`     | 16 chars | `00f067aa0ba902b7`                 |
 * | `traceFlags` | 2 chars  | `01`                               |
 *
 * Decoding never throws. Anything malformed decodes to
 * {@link INVALID_TRACE_CONTEXT}, which callers treat as "no coordinates".
 *
 * @module infrastructure/tracing/SpanContextCodec
 * @see {@link https://www.w3.org/TR/trace-context/ | W3C Trace Context}
 */

import { isValidSpanId, isValidTraceId, TraceFlags } from '@opentelemetry/api';
import type { TraceContext } from './ITracer';

/**
 * Hex rendering of a {@link TraceContext}.
 */
export interface EncodedTraceContext {
  traceId: string;
  spanId: string;
  traceFlags: string;
}

/**
 * Sentinel returned by {@link decodeTraceContext} for unusable input.
 */
export const INVALID_TRACE_CONTEXT: Readonly<TraceContext> = Object.freeze({
  traceId: '00000000000000000000000000000000',
  spanId: '0000000000000000',
  traceFlags: TraceFlags.NONE,
});

const TRACE_FLAGS_PATTERN = /^[0-9a-f]{2}$/i;

/**
 * Check that both ids of a context are well-formed and non-zero.
 */
export function isValidTraceContext(
  context: TraceContext | null | undefined,
): context is TraceContext {
  if (!context) {
    return false;
  }
  return isValidTraceId(context.traceId) && isValidSpanId(context.spanId);
}

/**
 * Render a context as the three hex strings embedded in messages.
 *
 * @example
 * ```typescript
 * encodeTraceContext({ traceId, spanId, traceFlags: TraceFlags.SAMPLED });
 * // { traceId, spanId, traceFlags: '01' }
 * ```
 */
export function encodeTraceContext(context: TraceContext): EncodedTraceContext {
  return {
    traceId: context.traceId.toLowerCase(),
    spanId: context.spanId.toLowerCase(),
    traceFlags: (context.traceFlags & 0xff).toString(16).padStart(2, '0'),
  };
}

/**
 * Rebuild a remote context from its hex fields.
 *
 * Missing flags default to "not sampled". A flags value that is present but
 * not two hex characters makes the whole context invalid, like a malformed
 * id does.
 *
 * @returns The decoded context (marked remote), or
 * {@link INVALID_TRACE_CONTEXT}
 */
export function decodeTraceContext(
  traceId: string | null | undefined,
  spanId: string | null | undefined,
  traceFlags?: string | null,
): TraceContext {
  if (!traceId || !spanId) {
    return INVALID_TRACE_CONTEXT;
  }
  if (!isValidTraceId(traceId) || !isValidSpanId(spanId)) {
    return INVALID_TRACE_CONTEXT;
  }

  let flags: number = TraceFlags.NONE;
  if (traceFlags) {
    if (!TRACE_FLAGS_PATTERN.test(traceFlags)) {
      return INVALID_TRACE_CONTEXT;
    }
    flags = parseInt(traceFlags, 16);
  }

  return {
    traceId: traceId.toLowerCase(),
    spanId: spanId.toLowerCase(),
    traceFlags: flags,
    isRemote: true,
  };
}
