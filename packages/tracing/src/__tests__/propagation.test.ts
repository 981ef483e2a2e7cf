import { describe, it, expect } from "vitest"
import { Effect, Either, Equal, HashMap, Option } from "effect"
import { withActiveTraceContext } from "../ActiveContext.js"
import { formatBaggage, normalizeTraceState, parseBaggage } from "../baggage.js"
import {
  CORRELATION_ID_KEY,
  ensureCorrelationId,
  extractCorrelationContext,
  TRANSACTION_ID_KEY,
  withCorrelationId
} from "../Correlation.js"
import { makeMessage } from "../domain/Message.js"
import { makeTraceContext } from "../domain/TraceContext.js"
import { extract, extractFromMessage, extractOrError, inject, injectInto } from "../propagation.js"
import { CreateOrder, SPAN_ID, TRACE_ID } from "./support.js"

// ═══════════════════════════════════════════════════════════════════════════
// Test Fixtures
// ═══════════════════════════════════════════════════════════════════════════

const TRACEPARENT = `00-${TRACE_ID}-${SPAN_ID}-01`

const context = makeTraceContext({ traceId: TRACE_ID, spanId: SPAN_ID, sampled: true })

const createMessage = (metadata: Iterable<readonly [string, string]> = []) =>
  makeMessage({ id: "msg-1", kind: "command", payload: new CreateOrder("order-1"), metadata })

// ═══════════════════════════════════════════════════════════════════════════
// inject / extract
// ═══════════════════════════════════════════════════════════════════════════

describe("inject", () => {
  it("should write a sampled traceparent", () => {
    const carrier = new Map<string, string>()

    inject(context, carrier)

    expect(Array.from(carrier.entries())).toEqual([["traceparent", TRACEPARENT]])
  })

  it("should write flags 00 for an unsampled context", () => {
    const carrier = new Map<string, string>()

    inject(makeTraceContext({ traceId: TRACE_ID, spanId: SPAN_ID, sampled: false }), carrier)

    expect(carrier.get("traceparent")).toBe(`00-${TRACE_ID}-${SPAN_ID}-00`)
  })

  it("should write nothing for an absent context", () => {
    const carrier = new Map([["tenant", "acme"]])

    inject(Option.none(), carrier)

    expect(Array.from(carrier.entries())).toEqual([["tenant", "acme"]])
  })

  it("should keep other keys and their order", () => {
    const carrier = new Map([
      ["tenant", "acme"],
      ["traceparent", "00-11111111111111111111111111111111-2222222222222222-01"],
      ["user", "u-1"]
    ])

    inject(context, carrier)

    expect(Array.from(carrier.keys())).toEqual(["tenant", "traceparent", "user"])
    expect(carrier.get("traceparent")).toBe(TRACEPARENT)
  })

  it("should remove stale tracestate and baggage when the context has none", () => {
    const carrier = new Map([
      ["tracestate", "old=1"],
      ["baggage", "old=1"]
    ])

    inject(context, carrier)

    expect(carrier.has("tracestate")).toBe(false)
    expect(carrier.has("baggage")).toBe(false)
  })

  it("should encode baggage with sorted keys", () => {
    const carrier = new Map<string, string>()
    const withBaggage = makeTraceContext({
      traceId: TRACE_ID,
      spanId: SPAN_ID,
      sampled: true,
      traceState: "vendor=abc",
      baggage: [
        ["user", "jane doe"],
        ["region", "eu"]
      ]
    })

    inject(withBaggage, carrier)

    expect(carrier.get("tracestate")).toBe("vendor=abc")
    expect(carrier.get("baggage")).toBe("region=eu,user=jane%20doe")
  })
})

describe("extract", () => {
  it("should return the context that was injected", () => {
    const original = makeTraceContext({
      traceId: TRACE_ID,
      spanId: SPAN_ID,
      sampled: true,
      traceState: "vendor=abc,other=xyz",
      baggage: [["user", "jane doe"]]
    })
    const carrier = new Map<string, string>()

    inject(original, carrier)
    const extracted = extract(carrier)

    expect(Option.isSome(extracted) && Equal.equals(extracted.value, original)).toBe(true)
  })

  it("should return none when there is no traceparent", () => {
    expect(Option.isNone(extract(new Map([["tenant", "acme"]])))).toBe(true)
  })

  it("should return none for a malformed traceparent", () => {
    expect(Option.isNone(extract(new Map([["traceparent", "not-a-traceparent"]])))).toBe(true)
  })

  it("should keep a valid traceparent when baggage is malformed", () => {
    const extracted = extract(
      new Map([
        ["traceparent", TRACEPARENT],
        ["baggage", "=orphan,region=eu"]
      ])
    )

    const region = Option.flatMap(extracted, (c) => HashMap.get(c.baggage, "region"))
    expect(Option.getOrUndefined(region)).toBe("eu")
  })
})

describe("extractOrError", () => {
  it("should describe the malformed traceparent", () => {
    const result = extractOrError(new Map([["traceparent", `00-${"0".repeat(32)}-${SPAN_ID}-01`]]))

    const error = Either.match(result, { onLeft: (e) => e, onRight: () => undefined })
    expect(error?._tag).toBe("PropagationError")
    expect(error?.key).toBe("traceparent")
    expect(error?.reason).toBe("trace-id is all zeros")
  })
})

describe("extractFromMessage", () => {
  it("should treat a malformed carrier as absent", async () => {
    const result = await Effect.runPromise(extractFromMessage(createMessage([["traceparent", "garbage"]])))

    expect(Option.isNone(result)).toBe(true)
  })
})

describe("injectInto", () => {
  it("should return a copy and leave the original untouched", () => {
    const original = createMessage([["tenant", "acme"]])

    const enriched = injectInto(original, context)

    expect(original.metadata.has("traceparent")).toBe(false)
    expect(enriched.metadata.get("traceparent")).toBe(TRACEPARENT)
    expect(enriched.metadata.get("tenant")).toBe("acme")
    expect(enriched.payload).toBe(original.payload)
  })
})

// ═══════════════════════════════════════════════════════════════════════════
// Baggage and tracestate lists
// ═══════════════════════════════════════════════════════════════════════════

describe("parseBaggage", () => {
  it("should decode members and drop properties", () => {
    const parsed = parseBaggage("user=jane%20doe;prop=1, region = eu")

    expect(Option.getOrUndefined(HashMap.get(parsed.value, "user"))).toBe("jane doe")
    expect(Option.getOrUndefined(HashMap.get(parsed.value, "region"))).toBe("eu")
    expect(parsed.skipped).toBe(0)
  })

  it("should count ill-formed members", () => {
    const parsed = parseBaggage("novalue,=x,bad=%E0%A4%A,ok=1")

    expect(HashMap.size(parsed.value)).toBe(1)
    expect(parsed.skipped).toBe(3)
  })
})

describe("formatBaggage", () => {
  it("should leave out entries that cannot be encoded", () => {
    const baggage = HashMap.make(["ok", "1"], ["broken", "\uD800"])

    expect(formatBaggage(baggage)).toBe("ok=1")
  })
})

describe("normalizeTraceState", () => {
  it("should keep the first occurrence of a key", () => {
    expect(normalizeTraceState("a=1, b=2,a=3").value).toBe("a=1,b=2")
  })

  it("should skip ill-formed members", () => {
    const result = normalizeTraceState("Upper=1,ok=2,novalue")

    expect(result.value).toBe("ok=2")
    expect(result.skipped).toBe(2)
  })

  it("should keep at most 32 members", () => {
    const header = Array.from({ length: 40 }, (_, i) => `k${i}=v`).join(",")

    const result = normalizeTraceState(header)

    expect(result.value.split(",")).toHaveLength(32)
    expect(result.skipped).toBe(8)
  })
})

// ═══════════════════════════════════════════════════════════════════════════
// Correlation
// ═══════════════════════════════════════════════════════════════════════════

describe("correlation", () => {
  it("should keep an existing correlation id", async () => {
    const message = withCorrelationId(createMessage(), "corr-1")

    const result = await Effect.runPromise(ensureCorrelationId(message))

    expect(result).toBe(message)
  })

  it("should assign a correlation id when missing", async () => {
    const result = await Effect.runPromise(ensureCorrelationId(createMessage()))

    expect(result.metadata.get(CORRELATION_ID_KEY)).toMatch(/^[0-9a-f-]{36}$/)
  })

  it("should take the trace id from the message first", async () => {
    const message = createMessage([
      [CORRELATION_ID_KEY, "corr-1"],
      [TRANSACTION_ID_KEY, "tx-1"],
      ["traceparent", TRACEPARENT]
    ])

    const result = await Effect.runPromise(extractCorrelationContext(message))

    expect(result).toEqual({ correlationId: "corr-1", transactionId: "tx-1", traceId: TRACE_ID })
  })

  it("should fall back to the active trace context", async () => {
    const active = makeTraceContext({ traceId: "a".repeat(32), spanId: "b".repeat(16), sampled: true })

    const result = await Effect.runPromise(
      extractCorrelationContext(createMessage()).pipe(withActiveTraceContext(active))
    )

    expect(result.traceId).toBe("a".repeat(32))
    expect(result.correlationId).toBeUndefined()
  })
})
