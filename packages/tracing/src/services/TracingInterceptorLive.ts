import { Cause, Clock, Effect, Exit, Layer, Option, Tracer } from "effect"
import { currentTraceContext, withActiveTraceContext } from "../ActiveContext.js"
import { isKindEnabled, TracingConfig } from "../config.js"
import type { HandlerIdentity, TracedMessage } from "../domain/Message.js"
import {
  aggregateLifecycleAttributes,
  commandResultAttributes,
  queryResultAttributes,
  valueTypeName
} from "../domain/ResultAttributes.js"
import type { MessageSpan } from "../domain/Span.js"
import { SpanAttributes } from "../domain/SpanAttributes.js"
import { makeTraceContext, type TraceContext } from "../domain/TraceContext.js"
import { extractFromMessage, injectInto } from "../propagation.js"
import { isValidSpanId, isValidTraceId } from "../traceparent.js"
import { ErrorCorrelator } from "./ErrorCorrelator.js"
import { SpanFactory } from "./SpanFactory.js"
import {
  TracingInterceptor,
  type DispatchedMessage,
  type DispatchOptions,
  type DispatchOutcome
} from "./TracingInterceptor.js"

const settled = (_exit: Exit.Exit<unknown, unknown>): Effect.Effect<void> => Effect.void

/**
 * Parent for new dispatch spans: the active handler context, else the Effect span
 * the caller is running in.
 */
const ambientParent: Effect.Effect<Option.Option<TraceContext>> = Effect.gen(function* () {
  const active = yield* currentTraceContext
  if (Option.isSome(active)) {
    return active
  }
  const effectSpan = yield* Effect.option(Effect.currentParentSpan)
  return Option.flatMap(effectSpan, (span) =>
    isValidTraceId(span.traceId) && isValidSpanId(span.spanId)
      ? Option.some(makeTraceContext({ traceId: span.traceId, spanId: span.spanId, sampled: span.sampled }))
      : Option.none()
  )
})

const asEffectParent = (ctx: TraceContext): Tracer.ExternalSpan =>
  Tracer.externalSpan({ traceId: ctx.traceId, spanId: ctx.spanId, sampled: ctx.sampled })

const recordDuration = (span: MessageSpan) =>
  Effect.flatMap(Clock.currentTimeMillis, (now) =>
    span.setAttribute(SpanAttributes.HANDLER_DURATION_MS, now - span.startTime)
  )

const setAll = (span: MessageSpan, attributes: Record<string, unknown>) =>
  Effect.forEach(Object.entries(attributes), ([key, value]) => span.setAttribute(key, value), { discard: true })

export const TracingInterceptorLive = Layer.effect(
  TracingInterceptor,
  Effect.gen(function* () {
    const config = yield* TracingConfig
    const factory = yield* SpanFactory
    const correlator = yield* ErrorCorrelator

    const settleDispatch = (span: MessageSpan, message: TracedMessage, exit: Exit.Exit<unknown, unknown>) =>
      Effect.gen(function* () {
        if (yield* span.isEnded) return
        const outcome: DispatchOutcome = Exit.isSuccess(exit)
          ? "success"
          : Cause.isInterruptedOnly(exit.cause)
            ? "cancelled"
            : "failure"
        yield* span.setAttribute(SpanAttributes.DISPATCH_OUTCOME, outcome)
        if (Exit.isSuccess(exit)) {
          yield* span.setAttribute(SpanAttributes.DISPATCH_RESULT_TYPE, valueTypeName(exit.value))
          yield* span.setStatus("OK")
        } else if (outcome === "cancelled") {
          yield* span.setStatus("CANCELLED", "dispatch interrupted")
        } else {
          yield* correlator.recordException(span, Cause.squash(exit.cause), { message, phase: "dispatch" })
        }
        yield* span.end
      }).pipe(Effect.uninterruptible)

    const dispatchOne = <P>(message: TracedMessage<P>, parent: Option.Option<TraceContext>) =>
      Effect.gen(function* () {
        if (!isKindEnabled(config, message.kind)) {
          const passthrough: DispatchedMessage<P> = { message, context: Option.none(), settle: settled }
          return passthrough
        }
        const span = yield* factory.createDispatchSpan(message, parent)
        const enriched = injectInto(message, span.context)

        if (message.kind === "event") {
          // fire-and-forget: the span covers the hand-off only
          yield* span.setStatus("OK")
          yield* span.end
          const published: DispatchedMessage<P> = { message: enriched, context: Option.some(span.context), settle: settled }
          return published
        }

        const sent: DispatchedMessage<P> = {
          message: enriched,
          context: Option.some(span.context),
          settle: (exit: Exit.Exit<unknown, unknown>) => settleDispatch(span, message, exit)
        }
        return sent
      })

    const wrapDispatch = <P>(messages: ReadonlyArray<TracedMessage<P>>, options: DispatchOptions = {}) =>
      Effect.gen(function* () {
        // one parent read for the whole batch
        const parent = options.parent ? Option.some(options.parent) : yield* ambientParent
        return yield* Effect.forEach(messages, (message) => dispatchOne(message, parent))
      })

    const traceDispatch = <P, A, E, R>(
      message: TracedMessage<P>,
      send: (message: TracedMessage<P>) => Effect.Effect<A, E, R>,
      options: DispatchOptions = {}
    ): Effect.Effect<A, E, R> =>
      Effect.uninterruptibleMask((restore) =>
        Effect.gen(function* () {
          const [dispatched] = yield* wrapDispatch([message], options)
          const exit = yield* Effect.exit(restore(send(dispatched.message)))
          yield* dispatched.settle(exit)
          return yield* exit
        })
      )

    const closeHandlerSpan = (
      span: MessageSpan,
      message: TracedMessage,
      handler: HandlerIdentity,
      exit: Exit.Exit<unknown, unknown>
    ) =>
      Effect.gen(function* () {
        yield* recordDuration(span)
        const subscription = message.kind === "query" && message.subscription === true
        if (subscription) {
          yield* span.setAttribute(SpanAttributes.QUERY_IS_SUBSCRIPTION, true)
        }
        if (Exit.isSuccess(exit)) {
          if (message.kind === "command") {
            yield* setAll(span, commandResultAttributes(exit.value))
            if (message.aggregate) {
              yield* setAll(span, aggregateLifecycleAttributes(message.aggregate))
            }
          } else if (message.kind === "query") {
            yield* setAll(span, queryResultAttributes(exit.value))
            if (subscription) {
              yield* span.setAttribute(SpanAttributes.QUERY_INITIAL_RESULT_TYPE, valueTypeName(exit.value))
            }
          }
          yield* span.setStatus("OK")
        } else if (Cause.isInterruptedOnly(exit.cause)) {
          yield* span.setStatus("CANCELLED", "handler interrupted")
        } else {
          yield* correlator.recordException(span, Cause.squash(exit.cause), { message, handler, phase: "handling" })
        }
        const ended = yield* span.end
        if (Option.isSome(ended) && ended.value.status === "ERROR") {
          yield* Effect.logDebug("Handler span ended with error", {
            name: ended.value.name,
            traceId: ended.value.traceId,
            spanId: ended.value.spanId
          })
        }
      })

    const wrapHandler = <P, A, E, R>(
      message: TracedMessage<P>,
      handler: HandlerIdentity,
      next: Effect.Effect<A, E, R>
    ): Effect.Effect<A, E, R> =>
      Effect.gen(function* () {
        if (!isKindEnabled(config, message.kind)) {
          return yield* next
        }
        // absent or malformed parent starts a new trace
        const parent = yield* extractFromMessage(message)
        return yield* Effect.acquireUseRelease(
          factory.createHandlerSpan(message, handler, parent),
          (span) =>
            Effect.provideService(next, Tracer.ParentSpan, asEffectParent(span.context)).pipe(
              withActiveTraceContext(span.context),
              Effect.annotateLogs({ traceId: span.context.traceId, spanId: span.context.spanId })
            ),
          (span, exit) => closeHandlerSpan(span, message, handler, exit)
        )
      })

    return { wrapDispatch, traceDispatch, wrapHandler }
  })
)
