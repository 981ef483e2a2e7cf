import { Context, type Effect, type Exit, type Option } from "effect"
import type { HandlerIdentity, TracedMessage } from "../domain/Message.js"
import type { TraceContext } from "../domain/TraceContext.js"

export type DispatchOutcome = "success" | "failure" | "cancelled"

export interface DispatchedMessage<P> {
  /** The message to hand to the bus, carrying the dispatch span's context */
  readonly message: TracedMessage<P>
  /** Context of the dispatch span; none when the message was not traced */
  readonly context: Option.Option<TraceContext>
  /**
   * Closes the dispatch span of a command or query once its outcome is known.
   * Does nothing for events, untraced messages, or after the first call.
   */
  readonly settle: (exit: Exit.Exit<unknown, unknown>) => Effect.Effect<void>
}

export interface DispatchOptions {
  /** Parent of the dispatch spans; defaults to the active context */
  readonly parent?: TraceContext
}

export class TracingInterceptor extends Context.Tag("TracingInterceptor")<
  TracingInterceptor,
  {
    /**
     * Start a dispatch span per message and propagate its context into the message.
     * All messages of a batch share one parent.
     */
    readonly wrapDispatch: <P>(
      messages: ReadonlyArray<TracedMessage<P>>,
      options?: DispatchOptions
    ) => Effect.Effect<ReadonlyArray<DispatchedMessage<P>>>

    /**
     * Dispatch a single message through `send`, settling its span on every exit path.
     */
    readonly traceDispatch: <P, A, E, R>(
      message: TracedMessage<P>,
      send: (message: TracedMessage<P>) => Effect.Effect<A, E, R>,
      options?: DispatchOptions
    ) => Effect.Effect<A, E, R>

    /**
     * Run `next` inside a handler span that continues the trace found in the message.
     * The outcome of `next` (value, failure, defect or interruption) is passed through unchanged.
     */
    readonly wrapHandler: <P, A, E, R>(
      message: TracedMessage<P>,
      handler: HandlerIdentity,
      next: Effect.Effect<A, E, R>
    ) => Effect.Effect<A, E, R>
  }
>() {}
