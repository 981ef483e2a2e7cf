import { describe, it, expect } from "vitest"
import { Effect, Layer } from "effect"
import { defaultTracingSettings as defaultSettings } from "../config.js"
import { AttributeValue } from "../domain/AttributeValue.js"
import { ExportError } from "../domain/errors.js"
import type { EndedSpan } from "../domain/Span.js"
import { SpanExporter } from "../services/SpanExporter.js"
import { SpanExportPipelineLive } from "../services/SpanExportPipelineLive.js"
import { SpanExportQueue, SpanExportQueueLive } from "../services/SpanExportQueue.js"
import {
  compositeFilter,
  configurationFilter,
  SpanFilter,
  SpanFilterLive,
  type ExportFilter
} from "../services/SpanFilter.js"
import { SpanProcessor, SpanProcessorLive } from "../services/SpanProcessor.js"
import { createEndedSpan, createMockConfig, spanIdOf } from "./support.js"

// ═══════════════════════════════════════════════════════════════════════════
// Test Fixtures
// ═══════════════════════════════════════════════════════════════════════════

const spanOfKind = (kind: string) =>
  createEndedSpan({}, [["message.kind", AttributeValue.String({ value: kind })]])

const accept: ExportFilter = { shouldExport: () => true }
const reject: ExportFilter = { shouldExport: () => false }

// ═══════════════════════════════════════════════════════════════════════════
// Mock Factories
// ═══════════════════════════════════════════════════════════════════════════

const createRecordingExporter = (fail = false) => {
  const batches: Array<ReadonlyArray<EndedSpan>> = []
  const layer = Layer.succeed(SpanExporter, {
    submit: (spans) =>
      Effect.suspend((): Effect.Effect<void, ExportError> => {
        batches.push(spans)
        return fail ? Effect.fail(new ExportError({ spanCount: spans.length, reason: "collector down" })) : Effect.void
      })
  })
  return { batches, layer }
}

const createProcessor = (filter: ExportFilter, capacity = 10) => {
  const QueueLive = SpanExportQueueLive.pipe(Layer.provide(createMockConfig({ exportQueueCapacity: capacity })))
  return SpanProcessorLive.pipe(Layer.provideMerge(QueueLive), Layer.provide(Layer.succeed(SpanFilter, filter)))
}

// ═══════════════════════════════════════════════════════════════════════════
// Filtering
// ═══════════════════════════════════════════════════════════════════════════

describe("configurationFilter", () => {
  it("should apply the per-kind flags", () => {
    const filter = configurationFilter({ ...defaultSettings, eventsEnabled: false })

    expect(filter.shouldExport(spanOfKind("event"))).toBe(false)
    expect(filter.shouldExport(spanOfKind("command"))).toBe(true)
  })

  it("should export spans without a recognizable kind", () => {
    const filter = configurationFilter({ ...defaultSettings, commandsEnabled: false })

    expect(filter.shouldExport(createEndedSpan())).toBe(true)
    expect(filter.shouldExport(spanOfKind("saga"))).toBe(true)
  })

  it("should export nothing when tracing is disabled", () => {
    const filter = configurationFilter({ ...defaultSettings, enabled: false })

    expect(filter.shouldExport(spanOfKind("command"))).toBe(false)
    expect(filter.shouldExport(createEndedSpan())).toBe(false)
  })
})

describe("compositeFilter", () => {
  it("should accept everything without filters", () => {
    expect(compositeFilter([]).shouldExport(createEndedSpan())).toBe(true)
  })

  it("should require every filter to accept", () => {
    let consulted = false
    const spy: ExportFilter = {
      shouldExport: () => {
        consulted = true
        return true
      }
    }

    expect(compositeFilter([accept, reject, spy]).shouldExport(createEndedSpan())).toBe(false)
    expect(consulted).toBe(false)
  })

  it("should read the filter settings from configuration", async () => {
    const filter = await Effect.runPromise(
      SpanFilter.pipe(Effect.provide(SpanFilterLive.pipe(Layer.provide(createMockConfig({ queriesEnabled: false })))))
    )

    expect(filter.shouldExport(spanOfKind("query"))).toBe(false)
  })
})

// ═══════════════════════════════════════════════════════════════════════════
// Processing
// ═══════════════════════════════════════════════════════════════════════════

describe("SpanProcessor", () => {
  it("should queue sampled spans the filter accepts", async () => {
    const program = Effect.gen(function* () {
      const processor = yield* SpanProcessor
      const queue = yield* SpanExportQueue
      yield* processor.onEnd(createEndedSpan({ spanId: spanIdOf(1) }))
      yield* processor.onEnd(createEndedSpan({ spanId: spanIdOf(2), sampled: false }))
      return yield* queue.size
    })

    expect(await Effect.runPromise(program.pipe(Effect.provide(createProcessor(accept))))).toBe(1)
  })

  it("should drop spans the filter rejects", async () => {
    const program = Effect.gen(function* () {
      const processor = yield* SpanProcessor
      yield* processor.onEnd(createEndedSpan())
      return yield* Effect.flatMap(SpanExportQueue, (q) => q.size)
    })

    expect(await Effect.runPromise(program.pipe(Effect.provide(createProcessor(reject))))).toBe(0)
  })

  it("should export a span when the filter throws", async () => {
    const broken: ExportFilter = {
      shouldExport: () => {
        throw new Error("filter bug")
      }
    }
    const program = Effect.gen(function* () {
      const processor = yield* SpanProcessor
      yield* processor.onEnd(createEndedSpan())
      return yield* Effect.flatMap(SpanExportQueue, (q) => q.size)
    })

    expect(await Effect.runPromise(program.pipe(Effect.provide(createProcessor(broken))))).toBe(1)
  })

  it("should drop the newest span and count it when the queue is full", async () => {
    const program = Effect.gen(function* () {
      const processor = yield* SpanProcessor
      const queue = yield* SpanExportQueue
      for (const n of [1, 2, 3]) {
        yield* processor.onEnd(createEndedSpan({ spanId: spanIdOf(n) }))
      }
      const queued = yield* queue.takeAll
      return { queued: Array.from(queued, (s) => s.spanId), dropped: yield* queue.dropped }
    })

    const { queued, dropped } = await Effect.runPromise(program.pipe(Effect.provide(createProcessor(accept, 2))))

    expect(queued).toEqual([spanIdOf(1), spanIdOf(2)])
    expect(dropped).toBe(1)
  })
})

// ═══════════════════════════════════════════════════════════════════════════
// Export pipeline
// ═══════════════════════════════════════════════════════════════════════════

describe("SpanExportPipelineLive", () => {
  const createPipeline = (exporter: Layer.Layer<SpanExporter>) => {
    const ConfigLive = createMockConfig({ exportBatchSize: 2 })
    return SpanExportPipelineLive.pipe(
      Layer.provideMerge(SpanExportQueueLive.pipe(Layer.provide(ConfigLive))),
      Layer.provide(exporter),
      Layer.provide(ConfigLive)
    )
  }

  const offerFive = Effect.gen(function* () {
    const queue = yield* SpanExportQueue
    for (const n of [1, 2, 3, 4, 5]) {
      yield* queue.offer(createEndedSpan({ spanId: spanIdOf(n) }))
    }
  })

  it("should hand every queued span to the exporter by shutdown", async () => {
    const exporter = createRecordingExporter()

    await Effect.runPromise(offerFive.pipe(Effect.provide(createPipeline(exporter.layer))))

    expect(exporter.batches.flat().map((s) => s.spanId)).toEqual([1, 2, 3, 4, 5].map(spanIdOf))
    expect(exporter.batches.every((batch) => batch.length <= 2)).toBe(true)
  })

  it("should keep exporting after the exporter fails", async () => {
    const exporter = createRecordingExporter(true)

    await Effect.runPromise(offerFive.pipe(Effect.provide(createPipeline(exporter.layer))))

    expect(exporter.batches.flat()).toHaveLength(5)
  })
})
