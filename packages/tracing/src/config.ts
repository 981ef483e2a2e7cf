import { Config, Context, Effect, Layer, Option } from "effect"
import { ConfigurationError } from "./domain/errors.js"
import type { MessageKind } from "./domain/Message.js"

export type SamplingStrategy = "AND" | "OR"

export interface TracingSettings {
  readonly enabled: boolean
  readonly commandsEnabled: boolean
  readonly eventsEnabled: boolean
  readonly queriesEnabled: boolean
  // Payload capture is opt-in per kind
  readonly captureCommandPayloads: boolean
  readonly captureEventPayloads: boolean
  readonly captureQueryPayloads: boolean
  readonly maxPayloadLength: number
  /** Probability in [0, 1] that a new trace is sampled */
  readonly sampleRate: number
  readonly tracesPerSecond: Option.Option<number>
  /** How the probability and rate-limit samplers are combined */
  readonly samplingStrategy: SamplingStrategy
  readonly exportQueueCapacity: number
  readonly exportBatchSize: number
  /** How long shutdown waits for error reports still being delivered */
  readonly errorReportFlushTimeoutMillis: number
  readonly messagingSystem: string
}

export class TracingConfig extends Context.Tag("TracingConfig")<TracingConfig, TracingSettings>() {}

export const defaultTracingSettings: TracingSettings = {
  enabled: true,
  commandsEnabled: true,
  eventsEnabled: true,
  queriesEnabled: true,
  captureCommandPayloads: false,
  captureEventPayloads: false,
  captureQueryPayloads: false,
  maxPayloadLength: 1000,
  sampleRate: 1,
  tracesPerSecond: Option.none(),
  samplingStrategy: "AND",
  exportQueueCapacity: 2048,
  exportBatchSize: 128,
  errorReportFlushTimeoutMillis: 2000,
  messagingSystem: "relay"
}

const positiveInteger = (key: string, value: number) =>
  Number.isInteger(value) && value > 0
    ? Effect.void
    : Effect.fail(new ConfigurationError({ key, reason: `must be a positive integer, got ${value}` }))

/**
 * Reject settings the tracing core cannot run with.
 * While tracing is disabled only the export queue sizes are checked: the queue and its
 * drainer exist either way.
 */
export const validateTracingSettings = (
  settings: TracingSettings
): Effect.Effect<TracingSettings, ConfigurationError> =>
  Effect.gen(function* () {
    yield* positiveInteger("TRACING_EXPORT_QUEUE_CAPACITY", settings.exportQueueCapacity)
    yield* positiveInteger("TRACING_EXPORT_BATCH_SIZE", settings.exportBatchSize)
    if (!settings.enabled) {
      return settings
    }
    if (!(settings.sampleRate >= 0 && settings.sampleRate <= 1)) {
      return yield* new ConfigurationError({
        key: "TRACING_SAMPLE_RATE",
        reason: `must be between 0 and 1, got ${settings.sampleRate}`
      })
    }
    yield* positiveInteger("TRACING_MAX_PAYLOAD_LENGTH", settings.maxPayloadLength)
    yield* positiveInteger("TRACING_ERROR_REPORT_FLUSH_TIMEOUT_MS", settings.errorReportFlushTimeoutMillis)
    if (Option.isSome(settings.tracesPerSecond) && !(settings.tracesPerSecond.value > 0)) {
      return yield* new ConfigurationError({
        key: "TRACING_TRACES_PER_SECOND",
        reason: `must be greater than 0, got ${settings.tracesPerSecond.value}`
      })
    }
    if (settings.messagingSystem.trim().length === 0) {
      return yield* new ConfigurationError({ key: "TRACING_MESSAGING_SYSTEM", reason: "must not be blank" })
    }
    return settings
  })

const read = <A>(key: string, config: Config.Config<A>): Effect.Effect<A, ConfigurationError> =>
  Effect.mapError(config, (error) => new ConfigurationError({ key, reason: String(error) }))

const flag = (key: string, fallback: boolean) =>
  read(key, Config.boolean(key).pipe(Config.withDefault(fallback)))

const number = (key: string, fallback: number) =>
  read(key, Config.number(key).pipe(Config.withDefault(fallback)))

export const TracingConfigLive = Layer.effect(
  TracingConfig,
  Effect.gen(function* () {
    const d = defaultTracingSettings
    const settings: TracingSettings = {
      enabled: yield* flag("TRACING_ENABLED", d.enabled),
      commandsEnabled: yield* flag("TRACING_COMMANDS_ENABLED", d.commandsEnabled),
      eventsEnabled: yield* flag("TRACING_EVENTS_ENABLED", d.eventsEnabled),
      queriesEnabled: yield* flag("TRACING_QUERIES_ENABLED", d.queriesEnabled),
      captureCommandPayloads: yield* flag("TRACING_CAPTURE_COMMAND_PAYLOADS", d.captureCommandPayloads),
      captureEventPayloads: yield* flag("TRACING_CAPTURE_EVENT_PAYLOADS", d.captureEventPayloads),
      captureQueryPayloads: yield* flag("TRACING_CAPTURE_QUERY_PAYLOADS", d.captureQueryPayloads),
      maxPayloadLength: yield* number("TRACING_MAX_PAYLOAD_LENGTH", d.maxPayloadLength),
      sampleRate: yield* number("TRACING_SAMPLE_RATE", d.sampleRate),
      tracesPerSecond: yield* read("TRACING_TRACES_PER_SECOND", Config.option(Config.number("TRACING_TRACES_PER_SECOND"))),
      samplingStrategy: yield* read(
        "TRACING_SAMPLING_STRATEGY",
        Config.literal("AND", "OR")("TRACING_SAMPLING_STRATEGY").pipe(Config.withDefault(d.samplingStrategy))
      ),
      exportQueueCapacity: yield* number("TRACING_EXPORT_QUEUE_CAPACITY", d.exportQueueCapacity),
      exportBatchSize: yield* number("TRACING_EXPORT_BATCH_SIZE", d.exportBatchSize),
      errorReportFlushTimeoutMillis: yield* number(
        "TRACING_ERROR_REPORT_FLUSH_TIMEOUT_MS",
        d.errorReportFlushTimeoutMillis
      ),
      messagingSystem: yield* read(
        "TRACING_MESSAGING_SYSTEM",
        Config.string("TRACING_MESSAGING_SYSTEM").pipe(Config.withDefault(d.messagingSystem))
      )
    }
    const valid = yield* validateTracingSettings(settings)
    yield* Effect.logDebug("Tracing configuration loaded", {
      enabled: valid.enabled,
      sampleRate: valid.sampleRate,
      samplingStrategy: valid.samplingStrategy,
      exportQueueCapacity: valid.exportQueueCapacity
    })
    return valid
  })
)

/**
 * Configuration layer from explicit settings, validated the same way as the environment.
 */
export const tracingConfigLayer = (overrides: Partial<TracingSettings> = {}) =>
  Layer.effect(TracingConfig, validateTracingSettings({ ...defaultTracingSettings, ...overrides }))

export const isKindEnabled = (settings: TracingSettings, kind: MessageKind): boolean => {
  if (!settings.enabled) return false
  switch (kind) {
    case "command":
      return settings.commandsEnabled
    case "query":
      return settings.queriesEnabled
    case "event":
      return settings.eventsEnabled
  }
}

export const capturesPayload = (settings: TracingSettings, kind: MessageKind): boolean => {
  switch (kind) {
    case "command":
      return settings.captureCommandPayloads
    case "query":
      return settings.captureQueryPayloads
    case "event":
      return settings.captureEventPayloads
  }
}
