import { Effect, FiberRef, Option } from "effect"
import type { TraceContext } from "./domain/TraceContext.js"

/**
 * Trace context of the span currently being handled by this fiber.
 * Forked fibers inherit the value; it never leaks between sibling fibers.
 */
export const ActiveTraceContext: FiberRef.FiberRef<Option.Option<TraceContext>> = FiberRef.unsafeMake(
  Option.none<TraceContext>()
)

export const currentTraceContext: Effect.Effect<Option.Option<TraceContext>> = FiberRef.get(ActiveTraceContext)

/**
 * Run `effect` with `ctx` as the active context. The previous value is restored on
 * every exit path, including interruption.
 */
export const withActiveTraceContext =
  (ctx: TraceContext) =>
  <A, E, R>(effect: Effect.Effect<A, E, R>): Effect.Effect<A, E, R> =>
    Effect.locally(effect, ActiveTraceContext, Option.some(ctx))
