import { Effect, Option } from "effect"
import { randomUUID } from "node:crypto"
import { currentTraceContext } from "./ActiveContext.js"
import { withMetadata, type TracedMessage } from "./domain/Message.js"
import { extract } from "./propagation.js"

export const CORRELATION_ID_KEY = "correlation.id"
export const TRANSACTION_ID_KEY = "transaction.id"

export interface CorrelationContext {
  readonly correlationId?: string
  readonly transactionId?: string
  readonly traceId?: string
}

const withEntry = <P>(message: TracedMessage<P>, key: string, value: string): TracedMessage<P> =>
  withMetadata(message, new Map(message.metadata).set(key, value))

export const withCorrelationId = <P>(message: TracedMessage<P>, correlationId: string): TracedMessage<P> =>
  withEntry(message, CORRELATION_ID_KEY, correlationId)

export const withTransactionId = <P>(message: TracedMessage<P>, transactionId: string): TracedMessage<P> =>
  withEntry(message, TRANSACTION_ID_KEY, transactionId)

/**
 * The message as is when it already has a correlation id, otherwise a copy with a new one
 */
export const ensureCorrelationId = <P>(message: TracedMessage<P>): Effect.Effect<TracedMessage<P>> =>
  message.metadata.has(CORRELATION_ID_KEY)
    ? Effect.succeed(message)
    : Effect.map(
        Effect.sync(() => randomUUID()),
        (id) => withCorrelationId(message, id)
      )

/**
 * Identifiers tying a message to its business flow and its trace.
 * The trace id comes from the message's traceparent, else from the active context.
 */
export const extractCorrelationContext = (message: TracedMessage): Effect.Effect<CorrelationContext> =>
  Effect.gen(function* () {
    const fromMessage = extract(message.metadata)
    const ctx = Option.isSome(fromMessage) ? fromMessage : yield* currentTraceContext
    return {
      correlationId: message.metadata.get(CORRELATION_ID_KEY),
      transactionId: message.metadata.get(TRANSACTION_ID_KEY),
      traceId: Option.getOrUndefined(Option.map(ctx, (c) => c.traceId))
    }
  })
