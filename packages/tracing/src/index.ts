/**
 * @relay-trace/tracing
 *
 * Distributed tracing for commands, queries and events: span creation, W3C trace context
 * propagation through message metadata, sampling, filtering and error correlation.
 */

// Domain
export { TraceContext, makeTraceContext, childContext, type TraceContextInit } from "./domain/TraceContext.js"
export {
  MessageKind,
  makeMessage,
  withMetadata,
  type TracedMessage,
  type HandlerIdentity,
  type AggregateInfo,
  type ProcessorInfo
} from "./domain/Message.js"
export {
  AttributeValue,
  toAttributeValue,
  attributePrimitive,
  attributeToString,
  type Attributes
} from "./domain/AttributeValue.js"
export { SpanKind, SpanStatus, type EndedSpan, type ExceptionEvent, type MessageSpan } from "./domain/Span.js"
export { SpanAttributes, type MessagingOperation } from "./domain/SpanAttributes.js"
export { cleanTypeName, messageName, dispatchSpanName, handlerSpanName } from "./domain/MessageName.js"
export { errorFingerprint, normalizeErrorMessage, type FailurePhase } from "./domain/ErrorFingerprint.js"
export {
  ConfigurationError,
  PropagationError,
  ProviderError,
  ExportError,
  ErrorReportingError
} from "./domain/errors.js"

// Traceparent parsing and formatting
export { parseTraceparent, formatTraceparent, isSampled, type Traceparent } from "./traceparent.js"

// Carrier propagation
export {
  inject,
  extract,
  extractOrError,
  injectInto,
  TRACEPARENT_KEY,
  TRACESTATE_KEY,
  BAGGAGE_KEY
} from "./propagation.js"

// Active context and correlation
export { ActiveTraceContext, currentTraceContext, withActiveTraceContext } from "./ActiveContext.js"
export {
  withCorrelationId,
  withTransactionId,
  ensureCorrelationId,
  extractCorrelationContext,
  CORRELATION_ID_KEY,
  TRANSACTION_ID_KEY,
  type CorrelationContext
} from "./Correlation.js"

// Configuration
export {
  TracingConfig,
  TracingConfigLive,
  tracingConfigLayer,
  defaultTracingSettings,
  type TracingSettings,
  type SamplingStrategy
} from "./config.js"

// Attribute providers
export { AttributeProviders, attributeProvidersLayer, type AttributeProvider } from "./attributes/AttributeProvider.js"
export { metadataAttributeProvider } from "./attributes/MetadataAttributeProvider.js"
export { correlationIdAttributeProvider } from "./attributes/CorrelationIdAttributeProvider.js"

// Services
export { TracingInterceptor, type DispatchedMessage, type DispatchOptions } from "./services/TracingInterceptor.js"
export { SpanFactory } from "./services/SpanFactory.js"
export { SpanFilter, configurationFilter, compositeFilter, type ExportFilter } from "./services/SpanFilter.js"
export {
  Sampler,
  probabilitySampler,
  rateLimitingSampler,
  compositeSampler,
  type TraceSampler
} from "./services/Sampler.js"
export { SpanExporter, NoopSpanExporter } from "./services/SpanExporter.js"
export { SpanExportQueue, spansDroppedCounter } from "./services/SpanExportQueue.js"
export { ErrorReporter, NoopErrorReporter, type ErrorReport } from "./services/ErrorReporter.js"
export { ErrorCorrelator } from "./services/ErrorCorrelator.js"

// Wiring
export { makeTracingLayer, type TracingLayerOptions } from "./layers.js"
export { TracingRuntime, type DispatchResult, type PendingDispatch } from "./TracingRuntime.js"
