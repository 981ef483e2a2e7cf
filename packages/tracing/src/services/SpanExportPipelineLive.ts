import { Chunk, Effect, Layer, Metric } from "effect"
import { TracingConfig } from "../config.js"
import type { EndedSpan } from "../domain/Span.js"
import { SpanExporter } from "./SpanExporter.js"
import { SpanExportQueue } from "./SpanExportQueue.js"

export const exportFailuresCounter = Metric.counter("tracing_span_export_failures_total", {
  description: "Span batches the exporter did not accept",
  incremental: true
})

/**
 * Drains the export queue into the exporter on a background fiber.
 * Closing the layer's scope stops the fiber and flushes what is left.
 */
export const SpanExportPipelineLive = Layer.scopedDiscard(
  Effect.gen(function* () {
    const config = yield* TracingConfig
    const queue = yield* SpanExportQueue
    const exporter = yield* SpanExporter

    const exportBatch = (spans: ReadonlyArray<EndedSpan>) =>
      exporter.submit(spans).pipe(
        Effect.catchTag("ExportError", (error) =>
          Effect.logWarning("Span export failed", { spanCount: error.spanCount, reason: error.reason }).pipe(
            Effect.zipRight(Metric.increment(exportFailuresCounter))
          )
        ),
        Effect.catchAllDefect((defect) =>
          Effect.logError("Span exporter crashed", { spanCount: spans.length, defect: String(defect) }).pipe(
            Effect.zipRight(Metric.increment(exportFailuresCounter))
          )
        ),
        Effect.uninterruptible
      )

    // Registered before the fiber is forked so it runs after the fiber is interrupted
    yield* Effect.addFinalizer(() =>
      Effect.gen(function* () {
        const remaining = yield* queue.takeAll
        for (const batch of Chunk.chunksOf(remaining, config.exportBatchSize)) {
          yield* exportBatch(Chunk.toReadonlyArray(batch))
        }
        yield* Effect.logDebug("Span export pipeline stopped", { flushed: Chunk.size(remaining) })
      })
    )

    // a batch once taken is always exported, even if the fiber is interrupted meanwhile
    yield* Effect.uninterruptibleMask((restore) =>
      restore(queue.takeBatch(config.exportBatchSize)).pipe(
        Effect.flatMap((batch) => exportBatch(Chunk.toReadonlyArray(batch)))
      )
    ).pipe(Effect.forever, Effect.forkScoped)
  })
)
