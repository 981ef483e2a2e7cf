/**
 * W3C baggage and tracestate list handling
 * baggage:    key1=value1,key2=value2;property
 * tracestate: vendor1=opaque1,vendor2=opaque2
 */

import { HashMap } from "effect"

export const MAX_TRACESTATE_MEMBERS = 32

const TRACESTATE_KEY_REGEX = /^(?:[a-z0-9][a-z0-9_\-*/]{0,255}|[a-z0-9][a-z0-9_\-*/]{0,240}@[a-z][a-z0-9_\-*/]{0,13})$/
// printable ASCII except "," and "=", no trailing space
const TRACESTATE_VALUE_REGEX = /^[\x20-\x2b\x2d-\x3c\x3e-\x7e]{0,255}[\x21-\x2b\x2d-\x3c\x3e-\x7e]$/

const encode = (text: string): string | undefined => {
  try {
    return encodeURIComponent(text)
  } catch (error) {
    // lone surrogates cannot be percent-encoded
    if (error instanceof URIError) return undefined
    throw error
  }
}

const decode = (text: string): string | undefined => {
  try {
    return decodeURIComponent(text)
  } catch (error) {
    if (error instanceof URIError) return undefined
    throw error
  }
}

/**
 * Encode baggage entries, keys in sorted order.
 * Entries whose key or value cannot be encoded are left out.
 */
export const formatBaggage = (baggage: HashMap.HashMap<string, string>): string => {
  const members: Array<string> = []
  const keys = Array.from(HashMap.keys(baggage)).sort()
  for (const key of keys) {
    const value = HashMap.unsafeGet(baggage, key)
    const encodedKey = encode(key)
    const encodedValue = encode(value)
    if (encodedKey && encodedValue !== undefined) {
      members.push(`${encodedKey}=${encodedValue}`)
    }
  }
  return members.join(",")
}

export interface ParsedList<A> {
  readonly value: A
  /** Members that were ill-formed and left out */
  readonly skipped: number
}

/**
 * Decode a baggage value. Member properties (after ";") are dropped.
 */
export const parseBaggage = (header: string): ParsedList<HashMap.HashMap<string, string>> => {
  let baggage = HashMap.empty<string, string>()
  let skipped = 0
  for (const raw of header.split(",")) {
    const member = raw.split(";")[0].trim()
    if (member.length === 0) continue
    const eq = member.indexOf("=")
    const key = eq > 0 ? decode(member.slice(0, eq).trim()) : undefined
    const value = eq > 0 ? decode(member.slice(eq + 1).trim()) : undefined
    if (!key || value === undefined) {
      skipped++
      continue
    }
    baggage = HashMap.set(baggage, key, value)
  }
  return { value: baggage, skipped }
}

/**
 * Normalize a tracestate value: well-formed members only, first occurrence of a key
 * wins, at most 32 members, joined with ",".
 */
export const normalizeTraceState = (header: string): ParsedList<string> => {
  const members: Array<string> = []
  const seen = new Set<string>()
  let skipped = 0
  for (const raw of header.split(",")) {
    const member = raw.trim()
    if (member.length === 0) continue
    const eq = member.indexOf("=")
    const key = member.slice(0, eq)
    const value = member.slice(eq + 1)
    if (eq <= 0 || !TRACESTATE_KEY_REGEX.test(key) || !TRACESTATE_VALUE_REGEX.test(value) || seen.has(key)) {
      skipped++
      continue
    }
    if (members.length === MAX_TRACESTATE_MEMBERS) {
      skipped++
      continue
    }
    seen.add(key)
    members.push(`${key}=${value}`)
  }
  return { value: members.join(","), skipped }
}
