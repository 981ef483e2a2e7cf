import { Chunk, Context, Effect, Layer, Metric, Queue, Ref } from "effect"
import { TracingConfig } from "../config.js"
import type { EndedSpan } from "../domain/Span.js"

/**
 * Bounded hand-off between span processing and the export collaborator.
 * Offering never blocks: when the queue is full the offered span is dropped and counted.
 */
export class SpanExportQueue extends Context.Tag("SpanExportQueue")<
  SpanExportQueue,
  {
    /** false when the span was dropped */
    readonly offer: (span: EndedSpan) => Effect.Effect<boolean>
    /** Waits for at least one span, returns at most `max` */
    readonly takeBatch: (max: number) => Effect.Effect<Chunk.Chunk<EndedSpan>>
    /** Everything currently queued, without waiting */
    readonly takeAll: Effect.Effect<Chunk.Chunk<EndedSpan>>
    readonly size: Effect.Effect<number>
    readonly dropped: Effect.Effect<number>
  }
>() {}

export const spansDroppedCounter = Metric.counter("tracing_spans_dropped_total", {
  description: "Spans dropped because the export queue was full",
  incremental: true
})

export const SpanExportQueueLive = Layer.effect(
  SpanExportQueue,
  Effect.gen(function* () {
    const config = yield* TracingConfig
    const queue = yield* Queue.dropping<EndedSpan>(config.exportQueueCapacity)
    const dropped = yield* Ref.make(0)

    return {
      offer: (span: EndedSpan) =>
        Effect.gen(function* () {
          const accepted = yield* Queue.offer(queue, span)
          if (!accepted) {
            const total = yield* Ref.updateAndGet(dropped, (n) => n + 1)
            yield* Metric.increment(spansDroppedCounter)
            yield* Effect.logDebug("Export queue full, span dropped", {
              traceId: span.traceId,
              spanId: span.spanId,
              name: span.name,
              droppedTotal: total
            })
          }
          return accepted
        }),
      takeBatch: (max: number) => Queue.takeBetween(queue, 1, max),
      takeAll: Queue.takeAll(queue),
      size: Queue.size(queue),
      dropped: Ref.get(dropped)
    }
  })
)
