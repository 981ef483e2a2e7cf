import { Context, Effect, Layer } from "effect"
import { randomBytes } from "node:crypto"

export class IdGenerator extends Context.Tag("IdGenerator")<
  IdGenerator,
  {
    /** 32 lowercase hex characters, never all zeros */
    readonly traceId: Effect.Effect<string>
    /** 16 lowercase hex characters, never all zeros */
    readonly spanId: Effect.Effect<string>
  }
>() {}

const NON_ZERO = /[1-9a-f]/

const nonZeroHex = (bytes: number): Effect.Effect<string> =>
  Effect.sync(() => {
    let hex = randomBytes(bytes).toString("hex")
    while (!NON_ZERO.test(hex)) {
      hex = randomBytes(bytes).toString("hex")
    }
    return hex
  })

export const IdGeneratorLive = Layer.succeed(IdGenerator, {
  traceId: nonZeroHex(16),
  spanId: nonZeroHex(8)
})
