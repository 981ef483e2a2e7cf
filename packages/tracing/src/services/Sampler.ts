import { Clock, Context, Effect, Random, Ref } from "effect"
import type { SamplingStrategy } from "../config.js"
import { ConfigurationError } from "../domain/errors.js"
import type { SpanKind } from "../domain/Span.js"

export interface SamplingInput {
  readonly traceId: string
  readonly spanName: string
  readonly spanKind: SpanKind
}

export interface TraceSampler {
  readonly description: string
  readonly shouldSample: (input: SamplingInput) => Effect.Effect<boolean>
}

/**
 * Head-based sampling decision, consulted once per trace at its root span.
 * Descendants inherit the decision through the propagated sampled flag.
 */
export class Sampler extends Context.Tag("Sampler")<Sampler, TraceSampler>() {}

export const alwaysSample: TraceSampler = {
  description: "AlwaysOn",
  shouldSample: () => Effect.succeed(true)
}

export const neverSample: TraceSampler = {
  description: "AlwaysOff",
  shouldSample: () => Effect.succeed(false)
}

/**
 * Samples a trace with probability `rate`, drawing from Effect's `Random` service.
 */
export const probabilitySampler = (rate: number): Effect.Effect<TraceSampler, ConfigurationError> => {
  if (!(rate >= 0 && rate <= 1)) {
    return Effect.fail(new ConfigurationError({ key: "sampleRate", reason: `must be between 0 and 1, got ${rate}` }))
  }
  if (rate === 1) return Effect.succeed({ ...alwaysSample, description: "ProbabilitySampler{rate=1}" })
  if (rate === 0) return Effect.succeed({ ...neverSample, description: "ProbabilitySampler{rate=0}" })
  return Effect.succeed({
    description: `ProbabilitySampler{rate=${rate}}`,
    shouldSample: () => Effect.map(Random.next, (draw) => draw < rate)
  })
}

interface Bucket {
  readonly tokens: number
  readonly lastRefill: number
}

/**
 * Token bucket: at most `tracesPerSecond` new traces per second on average,
 * with bursts of up to `burstCapacity`.
 */
export const rateLimitingSampler = (
  tracesPerSecond: number,
  burstCapacity: number = tracesPerSecond
): Effect.Effect<TraceSampler, ConfigurationError> =>
  Effect.gen(function* () {
    if (!(tracesPerSecond > 0)) {
      return yield* new ConfigurationError({
        key: "tracesPerSecond",
        reason: `must be positive, got ${tracesPerSecond}`
      })
    }
    if (!(burstCapacity > 0)) {
      return yield* new ConfigurationError({ key: "burstCapacity", reason: `must be positive, got ${burstCapacity}` })
    }
    const start = yield* Clock.currentTimeMillis
    const bucket = yield* Ref.make<Bucket>({ tokens: burstCapacity, lastRefill: start })
    const tokensPerMilli = tracesPerSecond / 1000

    const sampler: TraceSampler = {
      description: `RateLimitingSampler{tracesPerSecond=${tracesPerSecond}, burstCapacity=${burstCapacity}}`,
      shouldSample: () =>
        Effect.flatMap(Clock.currentTimeMillis, (now) =>
          Ref.modify(bucket, ({ tokens, lastRefill }): readonly [boolean, Bucket] => {
            const elapsed = Math.max(0, now - lastRefill)
            const available = Math.min(burstCapacity, tokens + elapsed * tokensPerMilli)
            return available >= 1
              ? [true, { tokens: available - 1, lastRefill: now }]
              : [false, { tokens: available, lastRefill: now }]
          })
        )
    }
    return sampler
  })

/**
 * AND: every sampler must accept. OR: any sampler accepting is enough.
 * Both stop at the first sampler that decides the outcome.
 */
export const compositeSampler = (
  strategy: SamplingStrategy,
  samplers: ReadonlyArray<TraceSampler>
): Effect.Effect<TraceSampler, ConfigurationError> => {
  if (samplers.length === 0) {
    return Effect.fail(new ConfigurationError({ key: "samplers", reason: "composite sampler needs at least one sampler" }))
  }
  // the first result equal to `decisive` settles the outcome
  const decisive = strategy === "OR"
  const composite: TraceSampler = {
    description: `CompositeSampler{strategy=${strategy}, samplers=[${samplers.map((s) => s.description).join(", ")}]}`,
    shouldSample: (input) =>
      Effect.gen(function* () {
        for (const sampler of samplers) {
          if ((yield* sampler.shouldSample(input)) === decisive) {
            return decisive
          }
        }
        return !decisive
      })
  }
  return Effect.succeed(composite)
}
