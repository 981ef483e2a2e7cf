import { Effect, Layer, Option } from "effect"
import { TracingConfig } from "../config.js"
import { compositeSampler, probabilitySampler, rateLimitingSampler, Sampler } from "./Sampler.js"

export const SamplerLive = Layer.effect(
  Sampler,
  Effect.gen(function* () {
    const config = yield* TracingConfig
    const probability = yield* probabilitySampler(config.sampleRate)

    const sampler = yield* Option.match(config.tracesPerSecond, {
      onNone: () => Effect.succeed(probability),
      onSome: (perSecond) =>
        Effect.flatMap(rateLimitingSampler(perSecond), (rateLimit) =>
          compositeSampler(config.samplingStrategy, [probability, rateLimit])
        )
    })

    yield* Effect.logDebug("Trace sampler configured", { sampler: sampler.description })
    return sampler
  })
)
