import { Console, Effect, Logger, LogLevel, pipe } from "effect"

import { logSeededEntropy } from "../core/text.js"
import { type Config, loadConfig } from "../shell/config.js"
import { readCommand } from "../shell/cli.js"
import { EntropyService, makeEntropySource } from "../shell/entropy.js"
import { runCommand } from "./commands.js"

const announceEntropy = (config: Config): Effect.Effect<void> =>
  config.seed === null ? Effect.void : Effect.logWarning(logSeededEntropy(config.seed))

const printLines = (lines: ReadonlyArray<string>): Effect.Effect<void> =>
  Effect.forEach(lines, (line) => Console.log(line), { discard: true })

// CHANGE: compose the cipher CLI from configuration, argv and the entropy service
// WHY: the core stays pure; every effect runs here through typed services
// SOURCE: n/a
// FORMAT THEOREM: forall argv, env: program = printed lines ∨ ConfigError ∨ UsageError ∨ EncodingError
// PURITY: SHELL
// EFFECT: Effect<void, ConfigError | UsageError | EncodingError, FileSystem | Path>
// INVARIANT: the minimum log level is applied to everything after config is read
// COMPLEXITY: O(n)/O(n)
export const program = pipe(
  loadConfig,
  Effect.flatMap((config) =>
    pipe(
      announceEntropy(config),
      Effect.zipRight(readCommand),
      Effect.flatMap(runCommand),
      Effect.flatMap(printLines),
      Effect.provideService(EntropyService, makeEntropySource(config.seed)),
      Logger.withMinimumLogLevel(LogLevel.fromLiteral(config.logLevel))
    )
  )
)
