import type { MessageKind, TracedMessage } from "./Message.js"

export const UNKNOWN_MESSAGE_NAME = "Unknown"

/**
 * Strip package qualification, proxy suffixes (`Foo$$Proxy`) and nested-class
 * markers (`Outer$Inner`, `Outer$1`) from a type name.
 */
export const cleanTypeName = (raw: string): string => {
  let name = raw.trim()
  const lastDot = name.lastIndexOf(".")
  if (lastDot >= 0) {
    name = name.slice(lastDot + 1)
  }
  const proxy = name.indexOf("$$")
  if (proxy > 0) {
    name = name.slice(0, proxy)
  }
  // anonymous: Outer$1 -> Outer
  name = name.replace(/(\$\d+)+$/, "")
  // nested: Outer$Inner -> Inner
  const nested = name.lastIndexOf("$")
  if (nested >= 0 && nested < name.length - 1) {
    name = name.slice(nested + 1)
  }
  return name.length > 0 ? name : UNKNOWN_MESSAGE_NAME
}

/**
 * Name of the payload's type: its constructor name, unless it is a plain object.
 */
export const payloadTypeName = (payload: unknown): string => {
  if (payload === null || payload === undefined) {
    return UNKNOWN_MESSAGE_NAME
  }
  if (typeof payload === "object") {
    const ctorName = payload.constructor?.name
    return ctorName && ctorName !== "Object" ? cleanTypeName(ctorName) : UNKNOWN_MESSAGE_NAME
  }
  return typeof payload
}

export const messageName = (message: TracedMessage): string => {
  const explicit = message.name?.trim()
  if (explicit) {
    return cleanTypeName(explicit)
  }
  return typeof message.payload === "object" ? payloadTypeName(message.payload) : UNKNOWN_MESSAGE_NAME
}

export const kindVerb = (kind: MessageKind): string => {
  switch (kind) {
    case "command":
      return "Command"
    case "query":
      return "Query"
    case "event":
      return "Event"
  }
}

export const dispatchSpanName = (message: TracedMessage): string =>
  `${kindVerb(message.kind)}: ${messageName(message)}`

export const handlerSpanName = (message: TracedMessage): string =>
  `Handle: ${messageName(message)}`
