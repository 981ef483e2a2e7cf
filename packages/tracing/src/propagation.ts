/**
 * Trace context propagation through message metadata.
 *
 * Keys owned by the tracing core:
 * - traceparent: 00-{trace-id}-{span-id}-{flags}
 * - tracestate:  vendor list, carried untouched
 * - baggage:     percent-encoded key=value pairs
 *
 * Every other metadata key is left as it is, in its original position.
 */

import { Effect, Either, HashMap, Option } from "effect"
import { formatBaggage, normalizeTraceState, parseBaggage } from "./baggage.js"
import { PropagationError } from "./domain/errors.js"
import { withMetadata, type TracedMessage } from "./domain/Message.js"
import { TraceContext } from "./domain/TraceContext.js"
import { formatTraceparent, isSampled, parseTraceparent, SAMPLED_FLAG } from "./traceparent.js"

export const TRACEPARENT_KEY = "traceparent"
export const TRACESTATE_KEY = "tracestate"
export const BAGGAGE_KEY = "baggage"

export const RESERVED_KEYS: ReadonlySet<string> = new Set([TRACEPARENT_KEY, TRACESTATE_KEY, BAGGAGE_KEY])

export const isReservedKey = (key: string): boolean => RESERVED_KEYS.has(key)

const asOption = (ctx: TraceContext | Option.Option<TraceContext>): Option.Option<TraceContext> =>
  ctx instanceof TraceContext ? Option.some(ctx) : ctx

/**
 * Write a context into a carrier. An absent context writes nothing.
 * Stale tracestate and baggage entries are removed when the context has none.
 */
export const inject = (
  ctx: TraceContext | Option.Option<TraceContext>,
  carrier: Map<string, string>
): void => {
  const present = asOption(ctx)
  if (Option.isNone(present)) return
  const { traceId, spanId, sampled, traceState, baggage } = present.value

  carrier.set(TRACEPARENT_KEY, formatTraceparent({ traceId, spanId, traceFlags: sampled ? SAMPLED_FLAG : 0 }))

  if (traceState.length > 0) {
    carrier.set(TRACESTATE_KEY, traceState)
  } else {
    carrier.delete(TRACESTATE_KEY)
  }

  const encodedBaggage = HashMap.isEmpty(baggage) ? "" : formatBaggage(baggage)
  if (encodedBaggage.length > 0) {
    carrier.set(BAGGAGE_KEY, encodedBaggage)
  } else {
    carrier.delete(BAGGAGE_KEY)
  }
}

/**
 * Read a context from a carrier.
 * Right(none) when no traceparent is present, Left when it is malformed.
 * Ill-formed tracestate or baggage members are skipped and never reject a valid traceparent.
 */
export const extractOrError = (
  carrier: ReadonlyMap<string, string>
): Either.Either<Option.Option<TraceContext>, PropagationError> => {
  const header = carrier.get(TRACEPARENT_KEY)
  if (header === undefined) {
    return Either.right(Option.none())
  }
  return Either.match(parseTraceparent(header), {
    onLeft: (reason) => Either.left(new PropagationError({ key: TRACEPARENT_KEY, value: header, reason })),
    onRight: (parent) =>
      Either.right(
        Option.some(
          new TraceContext({
            traceId: parent.traceId,
            spanId: parent.spanId,
            sampled: isSampled(parent.traceFlags),
            traceState: normalizeTraceState(carrier.get(TRACESTATE_KEY) ?? "").value,
            baggage: parseBaggage(carrier.get(BAGGAGE_KEY) ?? "").value
          })
        )
      )
  })
}

/**
 * Read a context from a carrier; anything missing or malformed is absent.
 */
export const extract = (carrier: ReadonlyMap<string, string>): Option.Option<TraceContext> =>
  Either.getOrElse(extractOrError(carrier), () => Option.none())

/**
 * Read the parent context of an inbound message, logging malformed carriers at debug.
 */
export const extractFromMessage = (message: TracedMessage): Effect.Effect<Option.Option<TraceContext>> =>
  Either.match(extractOrError(message.metadata), {
    onRight: Effect.succeed,
    onLeft: (error) =>
      Effect.logDebug("Ignoring malformed trace context", {
        messageId: message.id,
        key: error.key,
        value: error.value,
        reason: error.reason
      }).pipe(Effect.as(Option.none<TraceContext>()))
  })

/**
 * Copy of the message whose metadata carries `ctx`, replacing any trace keys of a previous hop.
 */
export const injectInto = <P>(message: TracedMessage<P>, ctx: TraceContext): TracedMessage<P> => {
  const metadata = new Map(message.metadata)
  inject(ctx, metadata)
  return withMetadata(message, metadata)
}
