import { Data, HashMap } from "effect"

/**
 * Where in a trace a unit of work sits.
 *
 * Immutable and structurally comparable (`Equal.equals`), so two contexts carrying the
 * same ids, flag, trace state and baggage are the same context. An absent context is
 * `Option.none()`; a TraceContext value always carries non-zero ids.
 */
export class TraceContext extends Data.Class<{
  /** 32 lowercase hex characters */
  readonly traceId: string
  /** 16 lowercase hex characters */
  readonly spanId: string
  /** Head-based sampling decision, inherited by every descendant */
  readonly sampled: boolean
  /** Normalized W3C tracestate list ("" when none) */
  readonly traceState: string
  readonly baggage: HashMap.HashMap<string, string>
}> {}

export interface TraceContextInit {
  readonly traceId: string
  readonly spanId: string
  readonly sampled: boolean
  readonly traceState?: string
  readonly baggage?: Iterable<readonly [string, string]>
}

export const makeTraceContext = (init: TraceContextInit): TraceContext =>
  new TraceContext({
    traceId: init.traceId,
    spanId: init.spanId,
    sampled: init.sampled,
    traceState: init.traceState ?? "",
    baggage: HashMap.fromIterable(init.baggage ?? [])
  })

/**
 * Context of a child span: same trace, flag, trace state and baggage, new span id.
 */
export const childContext = (parent: TraceContext, spanId: string): TraceContext =>
  new TraceContext({
    traceId: parent.traceId,
    spanId,
    sampled: parent.sampled,
    traceState: parent.traceState,
    baggage: parent.baggage
  })
