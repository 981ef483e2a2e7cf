import { CORRELATION_ID_KEY } from "../Correlation.js"
import { SpanAttributes } from "../domain/SpanAttributes.js"
import type { AttributeProvider } from "./AttributeProvider.js"

export interface CorrelationIdAttributeProviderOptions {
  readonly metadataKey?: string
  readonly attributeKey?: string
}

export const correlationIdAttributeProvider = (
  options: CorrelationIdAttributeProviderOptions = {}
): AttributeProvider => {
  const metadataKey = options.metadataKey ?? CORRELATION_ID_KEY
  const attributeKey = options.attributeKey ?? SpanAttributes.CORRELATION_ID
  return {
    name: "correlation-id",
    priority: 100,
    provide: (message) => ({ [attributeKey]: message.metadata.get(metadataKey) })
  }
}
