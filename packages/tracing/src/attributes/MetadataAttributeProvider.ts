import { isReservedKey } from "../propagation.js"
import type { AttributeProvider } from "./AttributeProvider.js"

export interface MetadataAttributeProviderOptions {
  /** Attribute key prefix; "" writes metadata keys as they are */
  readonly prefix?: string
  readonly keyFilter?: (key: string) => boolean
  readonly priority?: number
}

/**
 * Copies message metadata into `{prefix}.{key}` attributes.
 * Trace propagation keys are never copied.
 */
export const metadataAttributeProvider = (options: MetadataAttributeProviderOptions = {}): AttributeProvider => {
  const prefix = options.prefix ?? "metadata"
  return {
    name: "metadata",
    priority: options.priority ?? 0,
    provide: (message) => {
      const attributes: Record<string, string> = {}
      for (const [key, value] of message.metadata) {
        if (isReservedKey(key)) continue
        if (options.keyFilter && !options.keyFilter(key)) continue
        attributes[prefix.length > 0 ? `${prefix}.${key}` : key] = value
      }
      return attributes
    }
  }
}
