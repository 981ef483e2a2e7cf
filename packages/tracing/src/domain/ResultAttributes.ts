import { Option } from "effect"
import type { AggregateInfo } from "./Message.js"
import { SpanAttributes } from "./SpanAttributes.js"

const isPrimitive = (value: unknown): value is string | number | boolean | bigint =>
  typeof value === "string" || typeof value === "number" || typeof value === "boolean" || typeof value === "bigint"

export const valueTypeName = (value: unknown): string => {
  if (value === undefined || value === null) {
    return "void"
  }
  if (typeof value === "object") {
    return value.constructor?.name || "Object"
  }
  return typeof value
}

/**
 * Attributes describing what a command handler returned
 */
export const commandResultAttributes = (result: unknown): Record<string, unknown> => {
  if (result === undefined || result === null) {
    return { [SpanAttributes.COMMAND_RESULT_TYPE]: "void" }
  }
  return {
    [SpanAttributes.COMMAND_RESULT_TYPE]: valueTypeName(result),
    [SpanAttributes.COMMAND_RESULT]: isPrimitive(result) ? result : undefined
  }
}

/**
 * Attributes describing what a query handler returned: counts for collections,
 * presence for `Option`, the value itself for primitives.
 */
export const queryResultAttributes = (result: unknown): Record<string, unknown> => {
  if (result === undefined || result === null) {
    return { [SpanAttributes.QUERY_RESULT_TYPE]: "void" }
  }
  if (Option.isOption(result)) {
    return {
      [SpanAttributes.QUERY_RESULT_TYPE]: "Option",
      [SpanAttributes.QUERY_RESULT_PRESENT]: Option.isSome(result)
    }
  }
  if (Array.isArray(result)) {
    return { [SpanAttributes.QUERY_RESULT_TYPE]: "Array", [SpanAttributes.QUERY_RESULT_COUNT]: result.length }
  }
  if (result instanceof Set || result instanceof Map) {
    return {
      [SpanAttributes.QUERY_RESULT_TYPE]: result instanceof Set ? "Set" : "Map",
      [SpanAttributes.QUERY_RESULT_COUNT]: result.size
    }
  }
  return {
    [SpanAttributes.QUERY_RESULT_TYPE]: valueTypeName(result),
    [SpanAttributes.QUERY_RESULT]: isPrimitive(result) ? result : undefined
  }
}

/**
 * What a successful command did to its aggregate
 */
export const aggregateLifecycleAttributes = (aggregate: AggregateInfo): Record<string, unknown> => ({
  [SpanAttributes.AGGREGATE_EVENTS_APPLIED]: aggregate.eventsApplied ?? 0,
  [SpanAttributes.AGGREGATE_IS_CREATION]: aggregate.creation ?? false
})
