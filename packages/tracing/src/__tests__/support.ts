import { Effect, Layer, Option, Ref } from "effect"
import { AttributeProviders, type AttributeProvider } from "../attributes/AttributeProvider.js"
import { defaultTracingSettings, TracingConfig, type TracingSettings } from "../config.js"
import { attributePrimitive, type AttributeValue } from "../domain/AttributeValue.js"
import type { EndedSpan } from "../domain/Span.js"
import { IdGenerator } from "../IdGenerator.js"
import { ErrorCorrelatorLive } from "../services/ErrorCorrelatorLive.js"
import { ErrorReporter, type ErrorReport } from "../services/ErrorReporter.js"
import { alwaysSample, Sampler, type TraceSampler } from "../services/Sampler.js"
import { SpanFactoryLive } from "../services/SpanFactoryLive.js"
import { SpanProcessor } from "../services/SpanProcessor.js"
import { TracingInterceptorLive } from "../services/TracingInterceptorLive.js"

// ═══════════════════════════════════════════════════════════════════════════
// Test Fixtures
// ═══════════════════════════════════════════════════════════════════════════

export class CreateOrder {
  constructor(readonly orderId: string) {}
}

export class OrderCreated {
  constructor(readonly orderId: string) {}
}

export class FindOrder {
  constructor(readonly orderId: string) {}
}

export class IllegalArgumentException extends Error {}

export const TRACE_ID = "4bf92f3577b34da6a3ce929d0e0e4736"
export const SPAN_ID = "00f067aa0ba902b7"

/** n-th id handed out by the sequential id generator */
export const traceIdOf = (n: number) => n.toString(16).padStart(32, "0")
export const spanIdOf = (n: number) => n.toString(16).padStart(16, "0")

export const createEndedSpan = (
  overrides: Partial<EndedSpan> = {},
  attributes: Iterable<readonly [string, AttributeValue]> = []
): EndedSpan => ({
  traceId: TRACE_ID,
  spanId: SPAN_ID,
  parentSpanId: Option.none(),
  sampled: true,
  name: "Command: CreateOrder",
  kind: "CLIENT",
  attributes: new Map(attributes),
  status: "OK",
  statusMessage: Option.none(),
  exceptions: [],
  startTime: 0,
  endTime: 5,
  ...overrides
})

/** Plain value of a span attribute, `undefined` when absent */
export const attributeOf = (span: EndedSpan, key: string) => {
  const value = span.attributes.get(key)
  return value === undefined ? undefined : attributePrimitive(value)
}

// ═══════════════════════════════════════════════════════════════════════════
// Mock Factories
// ═══════════════════════════════════════════════════════════════════════════

export const createMockConfig = (overrides: Partial<TracingSettings> = {}) =>
  Layer.succeed(TracingConfig, { ...defaultTracingSettings, ...overrides })

/**
 * Ids 1, 2, 3, ... padded to full width; trace and span ids count separately
 */
export const createSequentialIds = () =>
  Layer.effect(
    IdGenerator,
    Effect.gen(function* () {
      const traces = yield* Ref.make(0)
      const spans = yield* Ref.make(0)
      return {
        traceId: Effect.map(Ref.updateAndGet(traces, (n) => n + 1), traceIdOf),
        spanId: Effect.map(Ref.updateAndGet(spans, (n) => n + 1), spanIdOf)
      }
    })
  )

export const createRecordingProcessor = () => {
  const ended: Array<EndedSpan> = []
  const layer = Layer.succeed(SpanProcessor, {
    onEnd: (span) => Effect.sync(() => void ended.push(span))
  })
  return { ended, layer }
}

export const createRecordingReporter = () => {
  const reports: Array<ErrorReport> = []
  const layer = Layer.succeed(ErrorReporter, {
    reportError: (_traceId, _spanId, report) => Effect.sync(() => void reports.push(report))
  })
  return { reports, layer }
}

export interface TestTracingOptions {
  readonly settings?: Partial<TracingSettings>
  readonly providers?: ReadonlyArray<AttributeProvider>
  readonly sampler?: TraceSampler
  readonly reporter?: Layer.Layer<ErrorReporter>
}

/**
 * Interceptor, span factory and error correlator over recording stubs
 */
export const createTestTracing = (options: TestTracingOptions = {}) => {
  const processor = createRecordingProcessor()
  const reporter = createRecordingReporter()

  const ConfigLive = createMockConfig(options.settings)
  const FactoryLive = SpanFactoryLive.pipe(
    Layer.provide(
      Layer.mergeAll(
        ConfigLive,
        createSequentialIds(),
        Layer.succeed(Sampler, options.sampler ?? alwaysSample),
        Layer.succeed(AttributeProviders, options.providers ?? []),
        processor.layer
      )
    )
  )
  const CorrelatorLive = ErrorCorrelatorLive.pipe(
    Layer.provide(options.reporter ?? reporter.layer),
    Layer.provide(ConfigLive)
  )
  const InterceptorLive = TracingInterceptorLive.pipe(
    Layer.provide(Layer.mergeAll(FactoryLive, CorrelatorLive, ConfigLive))
  )

  return {
    layer: Layer.mergeAll(InterceptorLive, FactoryLive, CorrelatorLive),
    ended: processor.ended,
    reports: reporter.reports
  }
}
