/**
 * Attribute keys written by the tracing core
 */
export const SpanAttributes = {
  MESSAGING_SYSTEM: "messaging.system",
  MESSAGING_OPERATION: "messaging.operation",

  MESSAGE_ID: "message.id",
  MESSAGE_KIND: "message.kind",
  MESSAGE_NAME: "message.name",
  MESSAGE_PAYLOAD_TYPE: "message.payload_type",
  MESSAGE_PAYLOAD: "message.payload",

  HANDLER_NAME: "handler.name",
  HANDLER_METHOD: "handler.method",
  HANDLER_GROUP: "handler.group",
  HANDLER_DURATION_MS: "handler.duration_ms",

  AGGREGATE_TYPE: "aggregate.type",
  AGGREGATE_ID: "aggregate.id",
  AGGREGATE_SEQUENCE_NUMBER: "aggregate.sequence_number",
  AGGREGATE_EVENTS_APPLIED: "aggregate.events_applied",
  AGGREGATE_IS_CREATION: "aggregate.is_creation",
  EVENT_TIMESTAMP: "event.timestamp",

  PROCESSOR_NAME: "processor.name",
  PROCESSOR_TYPE: "processor.type",
  PROCESSOR_SEGMENT: "processor.segment",
  PROCESSOR_REPLAYING: "processor.replaying",
  PROCESSOR_TOKEN_POSITION: "processor.token_position",

  DISPATCH_RESULT_TYPE: "dispatch.result_type",
  DISPATCH_OUTCOME: "dispatch.outcome",

  COMMAND_RESULT_TYPE: "command.result_type",
  COMMAND_RESULT: "command.result",
  QUERY_RESULT_TYPE: "query.result_type",
  QUERY_RESULT_COUNT: "query.result_count",
  QUERY_RESULT_PRESENT: "query.result_present",
  QUERY_RESULT: "query.result",
  QUERY_IS_SUBSCRIPTION: "query.is_subscription",
  QUERY_INITIAL_RESULT_TYPE: "query.initial_result_type",

  ERROR: "error",
  ERROR_TYPE: "error.type",
  ERROR_MESSAGE: "error.message",

  CORRELATION_ID: "correlation.id"
} as const

export type MessagingOperation = "publish" | "send" | "process"
