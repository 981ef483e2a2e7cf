import { Context, Effect } from "effect"
import type { FailurePhase } from "../domain/ErrorFingerprint.js"
import type { HandlerIdentity, TracedMessage } from "../domain/Message.js"
import { messageName } from "../domain/MessageName.js"
import type { MessageSpan } from "../domain/Span.js"
import { SpanAttributes } from "../domain/SpanAttributes.js"
import { isReservedKey } from "../propagation.js"

export interface FailureContext {
  readonly message?: TracedMessage
  readonly handler?: HandlerIdentity
  readonly phase?: FailurePhase
}

export class ErrorCorrelator extends Context.Tag("ErrorCorrelator")<
  ErrorCorrelator,
  {
    /**
     * Attach an error to a span (exception event, Error status, error attributes),
     * then hand a correlation report to the error-monitoring backend without waiting for it.
     * Never fails: reporting problems are logged.
     */
    readonly recordException: (span: MessageSpan, error: unknown, context?: FailureContext) => Effect.Effect<void>
  }
>() {}

/**
 * Searchable tags for an error report
 */
export const errorTags = (context: FailureContext): Record<string, string> => {
  const tags: Record<string, string> = {}
  const { message, handler } = context
  if (message) {
    tags[SpanAttributes.MESSAGE_ID] = message.id
    tags[SpanAttributes.MESSAGE_NAME] = messageName(message)
    tags[SpanAttributes.MESSAGE_KIND] = message.kind
    if (message.aggregate) {
      tags[SpanAttributes.AGGREGATE_TYPE] = message.aggregate.type
      tags[SpanAttributes.AGGREGATE_ID] = message.aggregate.id
      if (message.aggregate.sequenceNumber !== undefined) {
        tags[SpanAttributes.AGGREGATE_SEQUENCE_NUMBER] = String(message.aggregate.sequenceNumber)
      }
    }
    for (const [key, value] of message.metadata) {
      if (!isReservedKey(key)) {
        tags[`metadata.${key}`] = value
      }
    }
  }
  if (handler) {
    tags[SpanAttributes.HANDLER_NAME] = handler.name
  }
  return tags
}
