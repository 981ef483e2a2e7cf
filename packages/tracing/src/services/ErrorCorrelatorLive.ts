import { Clock, Duration, Effect, Fiber, FiberSet, Layer, Metric, Option } from "effect"
import { TracingConfig } from "../config.js"
import { errorMessageOf, errorStackOf, errorTypeName } from "../domain/describeError.js"
import { errorFingerprint } from "../domain/ErrorFingerprint.js"
import { SpanAttributes } from "../domain/SpanAttributes.js"
import type { MessageSpan } from "../domain/Span.js"
import { ErrorCorrelator, errorTags, type FailureContext } from "./ErrorCorrelator.js"
import { ErrorReporter, type ErrorReport } from "./ErrorReporter.js"

export const errorReportFailuresCounter = Metric.counter("tracing_error_report_failures_total", {
  description: "Error reports the error-monitoring backend did not accept",
  incremental: true
})

/**
 * Records failures on spans inline and delivers reports on background fibers,
 * so a slow or stuck error backend never holds up the failing handler.
 * Closing the layer's scope waits up to the flush timeout for reports in flight.
 */
export const ErrorCorrelatorLive = Layer.scoped(
  ErrorCorrelator,
  Effect.gen(function* () {
    const config = yield* TracingConfig
    const reporter = yield* ErrorReporter
    const inFlight = yield* FiberSet.make<void>()

    // Registered after the set, so it runs before the set interrupts what is left
    yield* Effect.addFinalizer(() =>
      Fiber.awaitAll(Array.from(inFlight)).pipe(
        Effect.timeoutOption(Duration.millis(config.errorReportFlushTimeoutMillis)),
        Effect.flatMap((flushed) =>
          Option.isSome(flushed)
            ? Effect.void
            : Effect.flatMap(FiberSet.size(inFlight), (pending) =>
                Effect.logWarning("Error reports abandoned at shutdown", { pending })
              )
        )
      )
    )

    const deliver = (report: ErrorReport) =>
      reporter.reportError(report.traceId, report.spanId, report).pipe(
        Effect.catchTag("ErrorReportingError", (failure) =>
          Effect.logWarning("Error report was not accepted", {
            traceId: report.traceId,
            spanId: report.spanId,
            reason: failure.reason
          }).pipe(Effect.zipRight(Metric.increment(errorReportFailuresCounter)))
        ),
        Effect.catchAllDefect((defect) =>
          Effect.logError("Error reporter crashed", {
            traceId: report.traceId,
            spanId: report.spanId,
            defect: String(defect)
          }).pipe(Effect.zipRight(Metric.increment(errorReportFailuresCounter)))
        )
      )

    return {
      recordException: (span: MessageSpan, error: unknown, context: FailureContext = {}) =>
        Effect.gen(function* () {
          const errorType = errorTypeName(error)
          const errorMessage = errorMessageOf(error)
          const timestamp = yield* Clock.currentTimeMillis

          yield* span.addException({ type: errorType, message: errorMessage, stack: errorStackOf(error), timestamp })
          yield* span.setStatus("ERROR", errorMessage.length > 0 ? errorMessage : errorType)
          yield* span.setAttribute(SpanAttributes.ERROR, true)
          yield* span.setAttribute(SpanAttributes.ERROR_TYPE, errorType)
          yield* span.setAttribute(SpanAttributes.ERROR_MESSAGE, errorMessage)

          const { traceId, spanId, sampled } = span.context
          const report: ErrorReport = {
            traceId,
            spanId,
            sampled,
            errorType,
            errorMessage,
            fingerprint: errorFingerprint({
              error,
              kind: context.message?.kind,
              phase: context.phase,
              aggregateType: context.message?.aggregate?.type
            }),
            tags: errorTags(context),
            error
          }

          yield* FiberSet.run(inFlight, deliver(report)).pipe(
            Effect.asVoid,
            // the set refuses new fibers once the layer is shut down
            Effect.catchAllCause(() => Effect.logDebug("Error report skipped after shutdown", { traceId, spanId }))
          )
        })
    }
  })
)
