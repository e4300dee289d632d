import * as FileSystem from "@effect/platform/FileSystem"
import * as Path from "@effect/platform/Path"
import * as S from "@effect/schema/Schema"
import dotenv from "dotenv"
import { Data, Effect, type LogLevel, pipe } from "effect"

import { RngSeed } from "../core/axioms.js"
import type { RngSeed as RngSeedBrand } from "../core/brand.js"

export class ConfigError extends Data.TaggedError("ConfigError")<{
  readonly message: string
}> {}

const logLevelSchema = S.Literal("All", "Fatal", "Error", "Warning", "Info", "Debug", "Trace", "None")

const envSchema = S.Struct({
  CIPHER_LOG_LEVEL: S.optionalWith(logLevelSchema, { default: () => "Info" as const }),
  CIPHER_RNG_SEED: S.optional(S.NumberFromString.pipe(S.int()))
})

type Env = S.Schema.Type<typeof envSchema>

export type Config = {
  readonly logLevel: LogLevel.Literal
  readonly seed: RngSeedBrand | null
}

const toConfigError = (
  error: ConfigError | Error | string
): ConfigError =>
  error instanceof ConfigError
    ? error
    : new ConfigError({
      message: error instanceof Error ? error.message : error
    })

// CHANGE: load a .env file next to the working directory or the module, if any
// WHY: configuration may come from a file as well as the process environment
// SOURCE: n/a
// FORMAT THEOREM: forall paths: the first existing candidate is loaded, none loads nothing
// PURITY: SHELL
// EFFECT: Effect<void, ConfigError, FileSystem | Path>
// INVARIANT: variables already set in process.env are not overridden
// COMPLEXITY: O(1)/O(1)
const loadEnv = pipe(
  Effect.gen(function*(_) {
    const fs = yield* _(FileSystem.FileSystem)
    const path = yield* _(Path.Path)
    const modulePath = yield* _(path.fromFileUrl(new URL(import.meta.url)))
    const moduleDir = path.dirname(modulePath)
    const cwd = process.cwd()
    const candidateEnvPaths = [
      path.resolve(cwd, ".env"),
      path.resolve(moduleDir, "../../.env"),
      path.resolve(moduleDir, "../../../../.env")
    ]

    for (const envPath of candidateEnvPaths) {
      const exists = yield* _(fs.exists(envPath))
      if (exists) {
        yield* _(Effect.logDebug(`Loading environment from ${envPath}`))
        dotenv.config({ path: envPath })
        return
      }
    }
  }),
  Effect.mapError((error) => toConfigError(error instanceof Error ? error : String(error))),
  Effect.asVoid
)

// CHANGE: decode cipher configuration from environment variables
// WHY: keep boundary data validated before it selects the entropy source
// SOURCE: n/a
// FORMAT THEOREM: forall env: decode(env) = config -> config.seed is an integer or null
// PURITY: SHELL
// EFFECT: Effect<Config, ConfigError, FileSystem | Path>
// INVARIANT: log level defaults to Info
// COMPLEXITY: O(1)/O(1)
export const loadConfig = pipe(
  loadEnv,
  Effect.flatMap(() => Effect.sync(() => process.env)),
  Effect.flatMap(S.decodeUnknown(envSchema)),
  Effect.map((env: Env): Config => ({
    logLevel: env.CIPHER_LOG_LEVEL,
    seed: env.CIPHER_RNG_SEED === undefined ? null : RngSeed(env.CIPHER_RNG_SEED)
  })),
  Effect.mapError((error) => toConfigError(error instanceof Error ? error : String(error)))
)
