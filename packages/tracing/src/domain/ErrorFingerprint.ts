import type { MessageKind } from "./Message.js"
import { errorMessageOf, errorStackOf, errorTypeName } from "./describeError.js"

export type FailurePhase = "dispatch" | "handling"

export const MAX_NORMALIZED_MESSAGE_LENGTH = 100

const UUID_PATTERN = /[0-9a-fA-F]{8}-[0-9a-fA-F]{4}-[0-9a-fA-F]{4}-[0-9a-fA-F]{4}-[0-9a-fA-F]{12}/g
const NUMBER_PATTERN = /\b\d+(\.\d+)?\b/g
const QUOTED_STRING_PATTERN = /"[^"]*"/g

// "    at Class.method (file:line:col)" or "    at async fn (file:line:col)"
const NAMED_FRAME_PATTERN = /^\s*at\s+(?:async\s+)?([^\s(]+)\s+\(/

/**
 * Collapse the variable parts of an error message so similar errors group together.
 */
export const normalizeErrorMessage = (message: string): string =>
  message
    .replace(UUID_PATTERN, "{uuid}")
    .replace(NUMBER_PATTERN, "{number}")
    .replace(QUOTED_STRING_PATTERN, "{string}")
    .slice(0, MAX_NORMALIZED_MESSAGE_LENGTH)

/**
 * Function name of the first stack frame, when the stack has a named frame on top.
 */
export const topStackFrame = (stack: string | undefined): string | undefined => {
  if (!stack) return undefined
  const firstFrame = stack.split("\n").find((line) => line.trimStart().startsWith("at "))
  return firstFrame ? NAMED_FRAME_PATTERN.exec(firstFrame)?.[1] : undefined
}

export interface FingerprintInput {
  readonly error: unknown
  readonly kind?: MessageKind
  readonly phase?: FailurePhase
  readonly aggregateType?: string
}

/**
 * Grouping key for an error: type, message kind and phase, aggregate type,
 * normalized message and top stack frame, without duplicates.
 */
export const errorFingerprint = (input: FingerprintInput): ReadonlyArray<string> => {
  const components: Array<string> = [errorTypeName(input.error)]
  if (input.kind) {
    components.push(`${input.kind}-${input.phase ?? "handling"}`)
  }
  if (input.aggregateType) {
    components.push(input.aggregateType)
  }
  const normalized = normalizeErrorMessage(errorMessageOf(input.error))
  if (normalized.length > 0) {
    components.push(normalized)
  }
  const frame = topStackFrame(errorStackOf(input.error))
  if (frame) {
    components.push(frame)
  }
  return Array.from(new Set(components))
}
