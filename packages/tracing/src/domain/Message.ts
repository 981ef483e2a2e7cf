import { Schema } from "effect"

export const MessageKind = Schema.Literal("command", "query", "event")
export type MessageKind = typeof MessageKind.Type

export interface AggregateInfo {
  readonly type: string
  readonly id: string
  readonly sequenceNumber?: number
  /** Events the handler applied to the aggregate while handling the command */
  readonly eventsApplied?: number
  /** True when the command created the aggregate */
  readonly creation?: boolean
}

/**
 * A message as handed to the tracing core by the dispatch framework.
 * Never mutated: propagation returns a copy carrying new metadata.
 */
export interface TracedMessage<P = unknown> {
  readonly id: string
  readonly kind: MessageKind
  /** Explicit message name; falls back to the payload's type name */
  readonly name?: string
  readonly payload: P
  /** Insertion-ordered carrier */
  readonly metadata: ReadonlyMap<string, string>
  readonly timestamp?: Date
  readonly aggregate?: AggregateInfo
  /** A query whose handler also streams updates after the initial result */
  readonly subscription?: boolean
}

export interface ProcessorInfo {
  readonly name: string
  readonly type?: string
  readonly segment?: number
  readonly replaying?: boolean
  readonly tokenPosition?: number
}

export interface HandlerIdentity {
  readonly name: string
  readonly method?: string
  readonly group?: string
  /** "sync" marks request/response handling on the caller's behalf */
  readonly mode?: "async" | "sync"
  readonly processor?: ProcessorInfo
}

export const makeMessage = <P>(init: {
  readonly id: string
  readonly kind: MessageKind
  readonly payload: P
  readonly name?: string
  readonly metadata?: Iterable<readonly [string, string]>
  readonly timestamp?: Date
  readonly aggregate?: AggregateInfo
  readonly subscription?: boolean
}): TracedMessage<P> => ({
  ...init,
  metadata: new Map(init.metadata ?? [])
})

export const withMetadata = <P>(
  message: TracedMessage<P>,
  metadata: ReadonlyMap<string, string>
): TracedMessage<P> => ({ ...message, metadata })
