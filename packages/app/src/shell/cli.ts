import * as S from "@effect/schema/Schema"
import { Data, Effect, pipe } from "effect"

import { formatUsage } from "../core/text.js"

export class UsageError extends Data.TaggedError("UsageError")<{
  readonly message: string
}> {}

const commandSchema = S.Union(
  S.Struct({ kind: S.Literal("keygen") }),
  S.Struct({ kind: S.Literal("encrypt"), text: S.String, key: S.optional(S.String) }),
  S.Struct({ kind: S.Literal("decrypt"), text: S.String, key: S.String }),
  S.Struct({ kind: S.Literal("brute-force"), text: S.String })
)

export type Command = S.Schema.Type<typeof commandSchema>

const maxArguments = 3

const toInput = (args: ReadonlyArray<string>): Readonly<Record<string, string>> => {
  const [kind, text, key] = args
  return {
    ...(kind === undefined ? {} : { kind }),
    ...(text === undefined ? {} : { text }),
    ...(key === undefined ? {} : { key })
  }
}

// CHANGE: decode command line arguments into a typed command
// WHY: keep argv parsing at the boundary so commands only see well-formed input
// SOURCE: n/a
// FORMAT THEOREM: forall argv: decode(argv) = Command ∨ UsageError
// PURITY: SHELL
// EFFECT: Effect<Command, UsageError, never>
// INVARIANT: letters are not validated here, the core parsers do that
// COMPLEXITY: O(1)/O(1)
export const decodeCommand = (args: ReadonlyArray<string>): Effect.Effect<Command, UsageError> =>
  args.length > maxArguments
    ? Effect.fail(new UsageError({ message: formatUsage() }))
    : pipe(
      S.decodeUnknown(commandSchema, { onExcessProperty: "error" })(toInput(args)),
      Effect.mapError(() => new UsageError({ message: formatUsage() }))
    )

export const readCommand = pipe(
  Effect.sync(() => process.argv.slice(2)),
  Effect.flatMap(decodeCommand)
)
