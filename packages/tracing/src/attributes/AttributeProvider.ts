import { Context, Effect, Layer, Option } from "effect"
import { toAttributeValue, type Attributes, type AttributeValue } from "../domain/AttributeValue.js"
import { ProviderError } from "../domain/errors.js"
import type { TracedMessage } from "../domain/Message.js"

/**
 * Pluggable span enrichment.
 *
 * Providers run in ascending `priority`; when two write the same key the higher
 * priority wins. A `null` or `undefined` value contributes nothing for its key.
 * Throwing is allowed: the provider is logged and skipped for that message.
 */
export interface AttributeProvider {
  readonly name: string
  readonly priority: number
  readonly provide: (message: TracedMessage) => Readonly<Record<string, unknown>>
}

export class AttributeProviders extends Context.Tag("AttributeProviders")<
  AttributeProviders,
  ReadonlyArray<AttributeProvider>
>() {}

export const attributeProvidersLayer = (providers: ReadonlyArray<AttributeProvider>) =>
  Layer.succeed(AttributeProviders, providers)

// Array.prototype.sort is stable, so ties keep registration order
export const sortByPriority = (providers: ReadonlyArray<AttributeProvider>): ReadonlyArray<AttributeProvider> =>
  [...providers].sort((a, b) => a.priority - b.priority)

const runProvider = (provider: AttributeProvider, message: TracedMessage) =>
  Effect.try({
    try: () => provider.provide(message),
    catch: (cause) => new ProviderError({ provider: provider.name, messageId: message.id, cause })
  }).pipe(
    Effect.map(Option.some),
    Effect.catchTag("ProviderError", (error) =>
      Effect.logWarning("Attribute provider failed, skipping", {
        provider: error.provider,
        messageId: error.messageId,
        error: String(error.cause)
      }).pipe(Effect.as(Option.none<Readonly<Record<string, unknown>>>()))
    )
  )

/**
 * Merge the output of every provider into one attribute map.
 */
export const applyProviders = (
  providers: ReadonlyArray<AttributeProvider>,
  message: TracedMessage
): Effect.Effect<Attributes> =>
  Effect.gen(function* () {
    const merged = new Map<string, AttributeValue>()
    for (const provider of sortByPriority(providers)) {
      const output = yield* runProvider(provider, message)
      if (Option.isNone(output)) continue
      for (const [key, raw] of Object.entries(output.value)) {
        const value = toAttributeValue(raw)
        if (Option.isSome(value)) {
          merged.set(key, value.value)
        }
      }
    }
    return merged
  })
