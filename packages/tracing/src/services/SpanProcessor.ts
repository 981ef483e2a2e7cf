import { Context, Effect, Layer } from "effect"
import type { EndedSpan } from "../domain/Span.js"
import { SpanExportQueue } from "./SpanExportQueue.js"
import { SpanFilter } from "./SpanFilter.js"

export class SpanProcessor extends Context.Tag("SpanProcessor")<
  SpanProcessor,
  {
    /** Called exactly once per span, when it ends */
    readonly onEnd: (span: EndedSpan) => Effect.Effect<void>
  }
>() {}

export const SpanProcessorLive = Layer.effect(
  SpanProcessor,
  Effect.gen(function* () {
    const filter = yield* SpanFilter
    const queue = yield* SpanExportQueue

    const accepts = (span: EndedSpan) =>
      Effect.try(() => filter.shouldExport(span)).pipe(
        Effect.catchAll((error) =>
          Effect.logWarning("Span filter failed, exporting span", {
            spanId: span.spanId,
            name: span.name,
            error: String(error.error)
          }).pipe(Effect.as(true))
        )
      )

    return {
      onEnd: (span: EndedSpan) =>
        Effect.gen(function* () {
          // head-based decision made at the trace root
          if (!span.sampled) return
          if (!(yield* accepts(span))) return
          yield* queue.offer(span)
        })
    }
  })
)
