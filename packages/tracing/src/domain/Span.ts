import { Clock, Effect, Option, Ref, Schema } from "effect"
import { toAttributeValue, type Attributes, type AttributeValue } from "./AttributeValue.js"
import type { TraceContext } from "./TraceContext.js"

export const SpanKind = Schema.Literal("CLIENT", "SERVER", "PRODUCER", "CONSUMER", "INTERNAL")
export type SpanKind = typeof SpanKind.Type

export const SpanStatus = Schema.Literal("UNSET", "OK", "ERROR", "CANCELLED")
export type SpanStatus = typeof SpanStatus.Type

export interface ExceptionEvent {
  readonly type: string
  readonly message: string
  readonly stack?: string
  /** Epoch millis */
  readonly timestamp: number
}

/**
 * Terminal, immutable record of a span, handed to the span processor once.
 */
export interface EndedSpan {
  readonly traceId: string
  readonly spanId: string
  readonly parentSpanId: Option.Option<string>
  readonly sampled: boolean
  readonly name: string
  readonly kind: SpanKind
  readonly attributes: Attributes
  readonly status: SpanStatus
  readonly statusMessage: Option.Option<string>
  readonly exceptions: ReadonlyArray<ExceptionEvent>
  readonly startTime: number
  readonly endTime: number
}

interface SpanState {
  readonly attributes: Attributes
  readonly status: SpanStatus
  readonly statusMessage: Option.Option<string>
  readonly exceptions: ReadonlyArray<ExceptionEvent>
  readonly ended: boolean
}

/**
 * A span between creation and end. Mutations after `end` are ignored.
 */
export interface MessageSpan {
  readonly name: string
  readonly kind: SpanKind
  readonly context: TraceContext
  readonly parentSpanId: Option.Option<string>
  readonly startTime: number
  /** `null`/`undefined` values are ignored */
  readonly setAttribute: (key: string, value: unknown) => Effect.Effect<void>
  readonly setAttributes: (attributes: Attributes) => Effect.Effect<void>
  readonly setStatus: (status: SpanStatus, message?: string) => Effect.Effect<void>
  readonly addException: (event: ExceptionEvent) => Effect.Effect<void>
  readonly isEnded: Effect.Effect<boolean>
  /**
   * Ends the span and hands it to `onEnd`.
   * Only the first call has an effect; later calls yield none.
   */
  readonly end: Effect.Effect<Option.Option<EndedSpan>>
}

export interface MessageSpanInit {
  readonly name: string
  readonly kind: SpanKind
  readonly context: TraceContext
  readonly parentSpanId: Option.Option<string>
  readonly attributes: Attributes
}

export const makeMessageSpan = (
  init: MessageSpanInit,
  onEnd: (span: EndedSpan) => Effect.Effect<void>
): Effect.Effect<MessageSpan> =>
  Effect.gen(function* () {
    const startTime = yield* Clock.currentTimeMillis
    const state = yield* Ref.make<SpanState>({
      attributes: init.attributes,
      status: "UNSET",
      statusMessage: Option.none(),
      exceptions: [],
      ended: false
    })

    const whileOpen = (f: (s: SpanState) => SpanState) =>
      Ref.update(state, (s) => (s.ended ? s : f(s)))

    const putAttribute = (key: string, value: AttributeValue) =>
      whileOpen((s) => ({ ...s, attributes: new Map(s.attributes).set(key, value) }))

    const end = Effect.gen(function* () {
      const endTime = yield* Clock.currentTimeMillis
      const previous = yield* Ref.getAndUpdate(state, (s) => ({ ...s, ended: true }))
      if (previous.ended) {
        return Option.none<EndedSpan>()
      }
      const ended: EndedSpan = {
        traceId: init.context.traceId,
        spanId: init.context.spanId,
        parentSpanId: init.parentSpanId,
        sampled: init.context.sampled,
        name: init.name,
        kind: init.kind,
        attributes: previous.attributes,
        status: previous.status,
        statusMessage: previous.statusMessage,
        exceptions: previous.exceptions,
        startTime,
        endTime
      }
      yield* onEnd(ended)
      return Option.some(ended)
    }).pipe(Effect.uninterruptible)

    return {
      name: init.name,
      kind: init.kind,
      context: init.context,
      parentSpanId: init.parentSpanId,
      startTime,
      setAttribute: (key, value) =>
        Option.match(toAttributeValue(value), {
          onNone: () => Effect.void,
          onSome: (converted) => putAttribute(key, converted)
        }),
      setAttributes: (attributes) =>
        whileOpen((s) => ({ ...s, attributes: new Map([...s.attributes, ...attributes]) })),
      setStatus: (status, message) =>
        whileOpen((s) => ({ ...s, status, statusMessage: Option.fromNullable(message) })),
      addException: (event) => whileOpen((s) => ({ ...s, exceptions: [...s.exceptions, event] })),
      isEnded: Effect.map(Ref.get(state), (s) => s.ended),
      end
    } satisfies MessageSpan
  })
