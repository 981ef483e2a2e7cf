import { Effect, Layer, Option } from "effect"
import { AttributeProviders, applyProviders } from "../attributes/AttributeProvider.js"
import { capturesPayload, TracingConfig, type TracingSettings } from "../config.js"
import { attributeToString, toAttributeValue, type AttributeValue } from "../domain/AttributeValue.js"
import type { HandlerIdentity, TracedMessage } from "../domain/Message.js"
import { dispatchSpanName, handlerSpanName, messageName, payloadTypeName } from "../domain/MessageName.js"
import { makeMessageSpan, type SpanKind } from "../domain/Span.js"
import { SpanAttributes, type MessagingOperation } from "../domain/SpanAttributes.js"
import { childContext, makeTraceContext, type TraceContext } from "../domain/TraceContext.js"
import { IdGenerator } from "../IdGenerator.js"
import { Sampler } from "./Sampler.js"
import { SpanFactory } from "./SpanFactory.js"
import { SpanProcessor } from "./SpanProcessor.js"

export const TRUNCATION_MARKER = "..."

export const truncatePayload = (text: string, maxLength: number): string =>
  text.length > maxLength ? text.slice(0, maxLength) + TRUNCATION_MARKER : text

const payloadText = (payload: unknown): string =>
  typeof payload === "string"
    ? payload
    : Option.match(toAttributeValue(payload), { onNone: () => String(payload), onSome: attributeToString })

const dispatchKind = (message: TracedMessage): SpanKind => (message.kind === "event" ? "PRODUCER" : "CLIENT")

const dispatchOperation = (message: TracedMessage): MessagingOperation =>
  message.kind === "event" ? "publish" : "send"

/**
 * Attributes every message span carries, plus aggregate and payload details when present
 */
const messageAttributes = (
  settings: TracingSettings,
  message: TracedMessage,
  operation: MessagingOperation
): Record<string, unknown> => {
  const attributes: Record<string, unknown> = {
    [SpanAttributes.MESSAGING_SYSTEM]: settings.messagingSystem,
    [SpanAttributes.MESSAGING_OPERATION]: operation,
    [SpanAttributes.MESSAGE_ID]: message.id,
    [SpanAttributes.MESSAGE_KIND]: message.kind,
    [SpanAttributes.MESSAGE_NAME]: messageName(message),
    [SpanAttributes.MESSAGE_PAYLOAD_TYPE]: payloadTypeName(message.payload)
  }
  if (message.aggregate) {
    attributes[SpanAttributes.AGGREGATE_TYPE] = message.aggregate.type
    attributes[SpanAttributes.AGGREGATE_ID] = message.aggregate.id
    attributes[SpanAttributes.AGGREGATE_SEQUENCE_NUMBER] = message.aggregate.sequenceNumber
    if (operation === "publish" && message.timestamp) {
      attributes[SpanAttributes.EVENT_TIMESTAMP] = message.timestamp
    }
  }
  if (capturesPayload(settings, message.kind)) {
    attributes[SpanAttributes.MESSAGE_PAYLOAD] = truncatePayload(payloadText(message.payload), settings.maxPayloadLength)
  }
  return attributes
}

const handlerAttributes = (message: TracedMessage, handler: HandlerIdentity): Record<string, unknown> => {
  const attributes: Record<string, unknown> = {
    [SpanAttributes.HANDLER_NAME]: handler.name,
    [SpanAttributes.HANDLER_METHOD]: handler.method
  }
  if (message.kind === "event") {
    attributes[SpanAttributes.HANDLER_GROUP] = handler.group
    if (handler.processor) {
      const { processor } = handler
      attributes[SpanAttributes.PROCESSOR_NAME] = processor.name
      attributes[SpanAttributes.PROCESSOR_TYPE] = processor.type
      attributes[SpanAttributes.PROCESSOR_SEGMENT] = processor.segment
      attributes[SpanAttributes.PROCESSOR_REPLAYING] = processor.replaying ?? false
      attributes[SpanAttributes.PROCESSOR_TOKEN_POSITION] = processor.tokenPosition
    }
  }
  return attributes
}

export const SpanFactoryLive = Layer.effect(
  SpanFactory,
  Effect.gen(function* () {
    const config = yield* TracingConfig
    const ids = yield* IdGenerator
    const sampler = yield* Sampler
    const providers = yield* AttributeProviders
    const processor = yield* SpanProcessor

    const resolveContext = (parent: Option.Option<TraceContext>, spanName: string, spanKind: SpanKind) =>
      Effect.gen(function* () {
        const spanId = yield* ids.spanId
        if (Option.isSome(parent)) {
          return childContext(parent.value, spanId)
        }
        const traceId = yield* ids.traceId
        const sampled = yield* sampler.shouldSample({ traceId, spanName, spanKind })
        return makeTraceContext({ traceId, spanId, sampled })
      })

    const startSpan = (
      message: TracedMessage,
      name: string,
      kind: SpanKind,
      parent: Option.Option<TraceContext>,
      standard: Record<string, unknown>
    ) =>
      Effect.gen(function* () {
        const context = yield* resolveContext(parent, name, kind)
        // providers first, so standard attributes always hold their defined meaning
        const attributes = new Map<string, AttributeValue>(yield* applyProviders(providers, message))
        for (const [key, raw] of Object.entries(standard)) {
          const value = toAttributeValue(raw)
          if (Option.isSome(value)) {
            attributes.set(key, value.value)
          }
        }
        const span = yield* makeMessageSpan(
          {
            name,
            kind,
            context,
            parentSpanId: Option.map(parent, (p) => p.spanId),
            attributes
          },
          processor.onEnd
        )
        yield* Effect.logDebug("Span started", {
          name,
          traceId: context.traceId,
          spanId: context.spanId,
          parentSpanId: Option.getOrUndefined(span.parentSpanId),
          sampled: context.sampled
        })
        return span
      })

    return {
      createDispatchSpan: (message: TracedMessage, parent: Option.Option<TraceContext>) =>
        startSpan(
          message,
          dispatchSpanName(message),
          dispatchKind(message),
          parent,
          messageAttributes(config, message, dispatchOperation(message))
        ),
      createHandlerSpan: (message: TracedMessage, handler: HandlerIdentity, parent: Option.Option<TraceContext>) =>
        startSpan(message, handlerSpanName(message), handler.mode === "sync" ? "SERVER" : "CONSUMER", parent, {
          ...messageAttributes(config, message, "process"),
          ...handlerAttributes(message, handler)
        })
    }
  })
)
