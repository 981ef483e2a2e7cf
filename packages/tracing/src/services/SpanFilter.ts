import { Context, Effect, Layer, Schema } from "effect"
import { TracingConfig, type TracingSettings } from "../config.js"
import { AttributeValue } from "../domain/AttributeValue.js"
import { MessageKind } from "../domain/Message.js"
import type { EndedSpan } from "../domain/Span.js"
import { SpanAttributes } from "../domain/SpanAttributes.js"

export interface ExportFilter {
  readonly shouldExport: (span: EndedSpan) => boolean
}

/**
 * Per-span inclusion policy applied when a sampled span ends
 */
export class SpanFilter extends Context.Tag("SpanFilter")<SpanFilter, ExportFilter>() {}

const isMessageKind = Schema.is(MessageKind)

/**
 * Global switch first, then the per-kind flag named by the span's `message.kind`.
 * Spans without a recognizable kind are exported.
 */
export const configurationFilter = (settings: TracingSettings): ExportFilter => ({
  shouldExport: (span) => {
    if (!settings.enabled) return false
    const tag = span.attributes.get(SpanAttributes.MESSAGE_KIND)
    if (tag === undefined || !AttributeValue.$is("String")(tag) || !isMessageKind(tag.value)) {
      return true
    }
    switch (tag.value) {
      case "command":
        return settings.commandsEnabled
      case "query":
        return settings.queriesEnabled
      case "event":
        return settings.eventsEnabled
    }
  }
})

/**
 * Logical AND, stopping at the first filter that rejects. No filters accept everything.
 */
export const compositeFilter = (filters: ReadonlyArray<ExportFilter>): ExportFilter => ({
  shouldExport: (span) => filters.every((filter) => filter.shouldExport(span))
})

export const SpanFilterLive = Layer.effect(
  SpanFilter,
  Effect.map(TracingConfig, configurationFilter)
)
