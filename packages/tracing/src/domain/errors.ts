import { Data } from "effect"

// ═══════════════════════════════════════════════════════════════════════════
// Startup Errors
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Invalid or missing tracing setting while tracing is enabled.
 * Raised when the configuration layer is built.
 */
export class ConfigurationError extends Data.TaggedError("ConfigurationError")<{
  readonly key: string
  readonly reason: string
}> {}

// ═══════════════════════════════════════════════════════════════════════════
// Absorbed Errors (logged, never surfaced to callers)
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Malformed trace-context content in a message carrier
 */
export class PropagationError extends Data.TaggedError("PropagationError")<{
  readonly key: string
  readonly value: string
  readonly reason: string
}> {}

/**
 * An attribute provider threw while enriching a span
 */
export class ProviderError extends Data.TaggedError("ProviderError")<{
  readonly provider: string
  readonly messageId: string
  readonly cause: unknown
}> {}

/**
 * The span export collaborator failed to accept a batch
 */
export class ExportError extends Data.TaggedError("ExportError")<{
  readonly spanCount: number
  readonly reason: string
}> {}

/**
 * The error-monitoring collaborator failed to accept a report
 */
export class ErrorReportingError extends Data.TaggedError("ErrorReportingError")<{
  readonly traceId: string
  readonly spanId: string
  readonly reason: string
}> {}
