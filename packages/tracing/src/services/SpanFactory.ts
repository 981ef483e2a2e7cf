import { Context, type Effect, type Option } from "effect"
import type { HandlerIdentity, TracedMessage } from "../domain/Message.js"
import type { MessageSpan } from "../domain/Span.js"
import type { TraceContext } from "../domain/TraceContext.js"

export class SpanFactory extends Context.Tag("SpanFactory")<
  SpanFactory,
  {
    /**
     * Span for sending a message: "Command: X" / "Query: X" (CLIENT) or "Event: X" (PRODUCER).
     * Without a parent the span starts a new, freshly sampled trace.
     */
    readonly createDispatchSpan: (
      message: TracedMessage,
      parent: Option.Option<TraceContext>
    ) => Effect.Effect<MessageSpan>
    /**
     * Span for handling a message: "Handle: X", CONSUMER, or SERVER for synchronous handlers.
     */
    readonly createHandlerSpan: (
      message: TracedMessage,
      handler: HandlerIdentity,
      parent: Option.Option<TraceContext>
    ) => Effect.Effect<MessageSpan>
  }
>() {}
