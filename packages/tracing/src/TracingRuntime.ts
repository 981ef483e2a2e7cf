import { Cause, Effect, Exit, FiberId, ManagedRuntime, Option } from "effect"
import { currentTraceContext } from "./ActiveContext.js"
import type { ConfigurationError } from "./domain/errors.js"
import type { HandlerIdentity, TracedMessage } from "./domain/Message.js"
import type { TraceContext } from "./domain/TraceContext.js"
import { makeTracingLayer, type TracingLayerOptions, type TracingServices } from "./layers.js"
import { TracingInterceptor, type DispatchOptions } from "./services/TracingInterceptor.js"

export type DispatchResult =
  | { readonly _tag: "Success"; readonly value: unknown }
  | { readonly _tag: "Failure"; readonly error: unknown }
  | { readonly _tag: "Cancelled" }

export interface PendingDispatch<P> {
  readonly message: TracedMessage<P>
  readonly context: TraceContext | undefined
  readonly settle: (result: DispatchResult) => Promise<void>
}

const toExit = (result: DispatchResult): Exit.Exit<unknown, unknown> => {
  switch (result._tag) {
    case "Success":
      return Exit.succeed(result.value)
    case "Failure":
      return Exit.fail(result.error)
    case "Cancelled":
      return Exit.interrupt(FiberId.none)
  }
}

// Rejects with the value the effect failed or died with, never a wrapper
const unwrap = <A>(exit: Exit.Exit<A, unknown>): A => {
  if (Exit.isSuccess(exit)) {
    return exit.value
  }
  throw Cause.squash(exit.cause)
}

/**
 * Promise-based handle on the tracing stack for callers outside Effect.
 * Owns its services; `shutdown` flushes pending spans and releases them.
 */
export class TracingRuntime {
  private constructor(
    private readonly runtime: ManagedRuntime.ManagedRuntime<TracingServices, ConfigurationError>
  ) {}

  static make(options: TracingLayerOptions = {}): TracingRuntime {
    return new TracingRuntime(ManagedRuntime.make(makeTracingLayer(options)))
  }

  /**
   * Build the tracing stack now, so invalid configuration is reported at startup.
   */
  static async start(options: TracingLayerOptions = {}): Promise<TracingRuntime> {
    const tracing = TracingRuntime.make(options)
    try {
      // layer build failures surface through the exit, unwrapped
      await tracing.run(Effect.void)
    } catch (error) {
      await tracing.shutdown()
      throw error
    }
    return tracing
  }

  private run<A>(effect: Effect.Effect<A, unknown, TracingInterceptor>): Promise<A> {
    return this.runtime.runPromiseExit(effect).then(unwrap)
  }

  wrapDispatch<P>(
    messages: ReadonlyArray<TracedMessage<P>>,
    options?: DispatchOptions
  ): Promise<ReadonlyArray<PendingDispatch<P>>> {
    return this.run(
      Effect.gen(function* () {
        const interceptor = yield* TracingInterceptor
        return yield* interceptor.wrapDispatch(messages, options)
      })
    ).then((dispatched) =>
      dispatched.map((d): PendingDispatch<P> => ({
        message: d.message,
        context: Option.getOrUndefined(d.context),
        settle: (result) => this.run(d.settle(toExit(result)))
      }))
    )
  }

  traceDispatch<P, A>(
    message: TracedMessage<P>,
    send: (message: TracedMessage<P>) => Promise<A>,
    options?: DispatchOptions
  ): Promise<A> {
    return this.run(
      Effect.gen(function* () {
        const interceptor = yield* TracingInterceptor
        return yield* interceptor.traceDispatch(
          message,
          (enriched) => Effect.tryPromise({ try: () => send(enriched), catch: (error) => error }),
          options
        )
      })
    )
  }

  /**
   * Run `next` inside a handler span. `next` receives the span's context (undefined when
   * the message is not traced); pass it as `{ parent }` to messages dispatched while
   * handling, since the active context does not follow the promise.
   */
  wrapHandler<P, A>(
    message: TracedMessage<P>,
    handler: HandlerIdentity,
    next: (context: TraceContext | undefined) => Promise<A>
  ): Promise<A> {
    return this.run(
      Effect.gen(function* () {
        const interceptor = yield* TracingInterceptor
        return yield* interceptor.wrapHandler(
          message,
          handler,
          Effect.flatMap(currentTraceContext, (active) =>
            Effect.tryPromise({ try: () => next(Option.getOrUndefined(active)), catch: (error) => error })
          )
        )
      })
    )
  }

  /**
   * Stop the export pipeline (flushing queued spans) and release every service.
   */
  shutdown(): Promise<void> {
    return this.runtime.dispose()
  }
}
