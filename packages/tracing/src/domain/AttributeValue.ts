import { Data, Option } from "effect"
import { errorMessageOf, errorTypeName } from "./describeError.js"

/**
 * Closed set of values a span attribute can hold
 */
export type AttributeValue = Data.TaggedEnum<{
  String: { readonly value: string }
  /** Signed 64-bit */
  Int: { readonly value: bigint }
  Float: { readonly value: number }
  Bool: { readonly value: boolean }
}>

export const AttributeValue = Data.taggedEnum<AttributeValue>()

export type Attributes = ReadonlyMap<string, AttributeValue>

class CyclicValue extends Error {}

// Object keys sorted so equal structures render identically
const canonical = (value: unknown, ancestors: ReadonlyArray<object>): unknown => {
  if (typeof value === "bigint") {
    return value.toString()
  }
  if (typeof value !== "object" || value === null) {
    return value
  }
  if (ancestors.includes(value)) {
    throw new CyclicValue()
  }
  const path = [...ancestors, value]
  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? null : value.toISOString()
  }
  if (Array.isArray(value)) {
    return value.map((item: unknown) => canonical(item, path))
  }
  if (value instanceof Map) {
    return Array.from(value.entries(), ([k, v]) => [canonical(k, path), canonical(v, path)])
  }
  if (value instanceof Set) {
    return Array.from(value.values(), (v) => canonical(v, path))
  }
  const sorted: Record<string, unknown> = {}
  for (const key of Object.keys(value).sort()) {
    sorted[key] = canonical(Reflect.get(value, key), path)
  }
  return sorted
}

const stableJson = (value: unknown): string => {
  try {
    return JSON.stringify(canonical(value, [])) ?? String(value)
  } catch (error) {
    if (error instanceof CyclicValue) {
      return String(value)
    }
    throw error
  }
}

/**
 * Total conversion of an arbitrary value into an attribute value.
 * `null` and `undefined` mean "omit the key" and yield none.
 */
export const toAttributeValue = (input: unknown): Option.Option<AttributeValue> => {
  if (input === null || input === undefined) {
    return Option.none()
  }
  switch (typeof input) {
    case "string":
      return Option.some(AttributeValue.String({ value: input }))
    case "boolean":
      return Option.some(AttributeValue.Bool({ value: input }))
    case "number":
      return Option.some(
        Number.isSafeInteger(input)
          ? AttributeValue.Int({ value: BigInt(input) })
          : AttributeValue.Float({ value: input })
      )
    case "bigint":
      return Option.some(AttributeValue.Int({ value: BigInt.asIntN(64, input) }))
    case "function":
    case "symbol":
      return Option.some(AttributeValue.String({ value: String(input) }))
  }
  if (input instanceof Date) {
    return Option.some(
      AttributeValue.String({ value: Number.isNaN(input.getTime()) ? String(input) : input.toISOString() })
    )
  }
  if (input instanceof Error) {
    return Option.some(AttributeValue.String({ value: `${errorTypeName(input)}: ${errorMessageOf(input)}` }))
  }
  return Option.some(AttributeValue.String({ value: stableJson(input) }))
}

/**
 * Plain JavaScript form of an attribute value
 */
export const attributePrimitive = (value: AttributeValue): string | bigint | number | boolean =>
  AttributeValue.$match(value, {
    String: ({ value }) => value,
    Int: ({ value }) => value,
    Float: ({ value }) => value,
    Bool: ({ value }) => value
  })

export const attributeToString = (value: AttributeValue): string => String(attributePrimitive(value))
