import { Context, Effect, Layer } from "effect"
import type { ExportError } from "../domain/errors.js"
import type { EndedSpan } from "../domain/Span.js"

/**
 * Export collaborator: receives batches of completed, sampled, accepted spans.
 * Transport and storage live behind this interface.
 */
export class SpanExporter extends Context.Tag("SpanExporter")<
  SpanExporter,
  {
    readonly submit: (spans: ReadonlyArray<EndedSpan>) => Effect.Effect<void, ExportError>
  }
>() {}

export const NoopSpanExporter = Layer.succeed(SpanExporter, {
  submit: () => Effect.void
})
