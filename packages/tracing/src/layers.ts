import { Layer } from "effect"
import { attributeProvidersLayer, type AttributeProvider, type AttributeProviders } from "./attributes/AttributeProvider.js"
import { correlationIdAttributeProvider } from "./attributes/CorrelationIdAttributeProvider.js"
import { TracingConfigLive, type TracingConfig } from "./config.js"
import type { ConfigurationError } from "./domain/errors.js"
import { IdGeneratorLive } from "./IdGenerator.js"
import { ErrorCorrelatorLive } from "./services/ErrorCorrelatorLive.js"
import { NoopErrorReporter, type ErrorReporter } from "./services/ErrorReporter.js"
import { NoopSpanExporter, type SpanExporter } from "./services/SpanExporter.js"
import { SpanExportPipelineLive } from "./services/SpanExportPipelineLive.js"
import { SpanExportQueueLive } from "./services/SpanExportQueue.js"
import { SamplerLive } from "./services/SamplerLive.js"
import { SpanFactoryLive } from "./services/SpanFactoryLive.js"
import { SpanFilterLive } from "./services/SpanFilter.js"
import { SpanProcessorLive } from "./services/SpanProcessor.js"
import type { TracingInterceptor } from "./services/TracingInterceptor.js"
import { TracingInterceptorLive } from "./services/TracingInterceptorLive.js"

export const DefaultAttributeProvidersLive = attributeProvidersLayer([correlationIdAttributeProvider()])

export type TracingServices = TracingInterceptor | TracingConfig | AttributeProviders

export interface TracingLayerOptions {
  readonly config?: Layer.Layer<TracingConfig, ConfigurationError>
  readonly exporter?: Layer.Layer<SpanExporter>
  readonly errorReporter?: Layer.Layer<ErrorReporter>
  readonly providers?: ReadonlyArray<AttributeProvider>
}

/**
 * Complete tracing stack. Configuration comes from the environment unless given;
 * exporter and error reporter default to no-ops.
 */
export const makeTracingLayer = (
  options: TracingLayerOptions = {}
): Layer.Layer<TracingServices, ConfigurationError> => {
  const ConfigLive = options.config ?? TracingConfigLive
  const ProvidersLive = options.providers ? attributeProvidersLayer(options.providers) : DefaultAttributeProvidersLive

  // Export side (depends on config and the exporter)
  const QueueLive = SpanExportQueueLive.pipe(Layer.provide(ConfigLive))
  const PipelineLive = SpanExportPipelineLive.pipe(
    Layer.provide(QueueLive),
    Layer.provide(options.exporter ?? NoopSpanExporter),
    Layer.provide(ConfigLive)
  )
  const ProcessorLive = SpanProcessorLive.pipe(
    Layer.provide(QueueLive),
    Layer.provide(SpanFilterLive.pipe(Layer.provide(ConfigLive)))
  )

  const FactoryLive = SpanFactoryLive.pipe(
    Layer.provide(ProcessorLive),
    Layer.provide(SamplerLive.pipe(Layer.provide(ConfigLive))),
    Layer.provide(IdGeneratorLive),
    Layer.provide(ProvidersLive),
    Layer.provide(ConfigLive)
  )

  const InterceptorLive = TracingInterceptorLive.pipe(
    Layer.provide(FactoryLive),
    Layer.provide(
      ErrorCorrelatorLive.pipe(Layer.provide(options.errorReporter ?? NoopErrorReporter), Layer.provide(ConfigLive))
    ),
    Layer.provide(ConfigLive)
  )

  return Layer.mergeAll(InterceptorLive, PipelineLive, ConfigLive, ProvidersLive)
}
