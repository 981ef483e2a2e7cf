/**
 * W3C Trace Context traceparent parsing and formatting
 * Format: {version}-{trace-id}-{parent-id}-{trace-flags}
 * Example: 00-4bf92f3577b34da6a3ce929d0e0e4736-00f067aa0ba902b7-01
 */

import { Either } from "effect"

export interface Traceparent {
  readonly traceId: string
  readonly spanId: string
  readonly traceFlags: number
}

export const TRACEPARENT_VERSION = "00"
export const SAMPLED_FLAG = 0x01

const INVALID_TRACE_ID = "00000000000000000000000000000000"
const INVALID_SPAN_ID = "0000000000000000"

// version: 2 hex digits (currently "00")
// traceId: 32 hex digits (16 bytes)
// spanId: 16 hex digits (8 bytes)
// traceFlags: 2 hex digits (1 byte)
const TRACEPARENT_REGEX = /^([0-9a-f]{2})-([0-9a-f]{32})-([0-9a-f]{16})-([0-9a-f]{2})$/i

const TRACE_ID_REGEX = /^[0-9a-f]{32}$/
const SPAN_ID_REGEX = /^[0-9a-f]{16}$/

/**
 * Parse a traceparent value.
 * Left carries the reason the value was rejected.
 */
export const parseTraceparent = (header: string): Either.Either<Traceparent, string> => {
  const match = TRACEPARENT_REGEX.exec(header)
  if (!match) {
    return Either.left("traceparent does not match {version}-{trace-id}-{span-id}-{flags}")
  }

  const [, version, traceId, spanId, flags] = match

  // Reject unknown versions (only 00 is currently supported)
  if (version !== TRACEPARENT_VERSION) {
    return Either.left(`unsupported traceparent version ${version}`)
  }

  if (traceId === INVALID_TRACE_ID) {
    return Either.left("trace-id is all zeros")
  }

  if (spanId === INVALID_SPAN_ID) {
    return Either.left("span-id is all zeros")
  }

  return Either.right({
    traceId: traceId.toLowerCase(),
    spanId: spanId.toLowerCase(),
    traceFlags: parseInt(flags, 16)
  })
}

/**
 * Format a Traceparent into its wire form
 */
export const formatTraceparent = (ctx: Traceparent): string => {
  const flags = ctx.traceFlags.toString(16).padStart(2, "0")
  return `${TRACEPARENT_VERSION}-${ctx.traceId}-${ctx.spanId}-${flags}`
}

/**
 * Check if the sampled flag is set in trace flags
 */
export const isSampled = (traceFlags: number): boolean => {
  return (traceFlags & SAMPLED_FLAG) === SAMPLED_FLAG
}

export const isValidTraceId = (traceId: string): boolean =>
  TRACE_ID_REGEX.test(traceId) && traceId !== INVALID_TRACE_ID

export const isValidSpanId = (spanId: string): boolean =>
  SPAN_ID_REGEX.test(spanId) && spanId !== INVALID_SPAN_ID
