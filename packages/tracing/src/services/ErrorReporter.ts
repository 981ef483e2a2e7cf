import { Context, Effect, Layer } from "effect"
import type { ErrorReportingError } from "../domain/errors.js"

/**
 * What the error-monitoring backend receives alongside an exception, keyed by the
 * span it happened in so both systems can be cross-referenced.
 */
export interface ErrorReport {
  readonly traceId: string
  readonly spanId: string
  readonly sampled: boolean
  readonly errorType: string
  readonly errorMessage: string
  readonly fingerprint: ReadonlyArray<string>
  readonly tags: Readonly<Record<string, string>>
  readonly error: unknown
}

export class ErrorReporter extends Context.Tag("ErrorReporter")<
  ErrorReporter,
  {
    readonly reportError: (
      traceId: string,
      spanId: string,
      report: ErrorReport
    ) => Effect.Effect<void, ErrorReportingError>
  }
>() {}

export const NoopErrorReporter = Layer.succeed(ErrorReporter, {
  reportError: () => Effect.void
})
