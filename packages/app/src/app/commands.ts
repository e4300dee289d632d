import { Effect, Match } from "effect"

import { bruteForce, decrypt, encrypt } from "../core/cipher.js"
import type { EncodingError } from "../core/errors.js"
import { insecureExport, type Key, parseKey, randomKey } from "../core/key.js"
import {
  formatCandidate,
  formatGeneratedKey,
  logBruteForce,
  logCommand,
  logKeyExported
} from "../core/text.js"
import { parseCiphertext, parseMessage, renderCiphertext, renderMessage } from "../core/texts.js"
import type { Command } from "../shell/cli.js"
import { EntropyService } from "../shell/entropy.js"

type Output = ReadonlyArray<string>

const generateKey: Effect.Effect<Key, never, EntropyService> = Effect.gen(function*(_) {
  const source = yield* _(EntropyService)
  const key = randomKey(source)
  yield* _(Effect.logWarning(logKeyExported()))
  return key
})

const runKeygen = (): Effect.Effect<Output, never, EntropyService> =>
  Effect.map(generateKey, (key) => [insecureExport(key)])

const runEncrypt = (
  text: string,
  keyText: string | undefined
): Effect.Effect<Output, EncodingError, EntropyService> =>
  Effect.gen(function*(_) {
    const message = yield* _(parseMessage(text))
    if (keyText !== undefined) {
      const key = yield* _(parseKey(keyText))
      return [renderCiphertext(encrypt(message, key))]
    }
    const key = yield* _(generateKey)
    return [formatGeneratedKey(insecureExport(key)), renderCiphertext(encrypt(message, key))]
  })

const runDecrypt = (text: string, keyText: string): Effect.Effect<Output, EncodingError> =>
  Effect.gen(function*(_) {
    const ciphertext = yield* _(parseCiphertext(text))
    const key = yield* _(parseKey(keyText))
    return [renderMessage(decrypt(ciphertext, key))]
  })

const runBruteForce = (text: string): Effect.Effect<Output, EncodingError> =>
  Effect.gen(function*(_) {
    const ciphertext = yield* _(parseCiphertext(text))
    yield* _(Effect.logDebug(logBruteForce(ciphertext.elements.length)))
    return bruteForce(ciphertext).map(formatCandidate)
  })

const dispatch = (command: Command): Effect.Effect<Output, EncodingError, EntropyService> =>
  Match.value(command).pipe(
    Match.when({ kind: "keygen" }, () => runKeygen()),
    Match.when({ kind: "encrypt" }, (value) => runEncrypt(value.text, value.key)),
    Match.when({ kind: "decrypt" }, (value) => runDecrypt(value.text, value.key)),
    Match.when({ kind: "brute-force" }, (value) => runBruteForce(value.text)),
    Match.exhaustive
  )

// CHANGE: run a decoded command against the cipher core
// WHY: keep every user-input failure typed as EncodingError for the caller to report
// SOURCE: n/a
// FORMAT THEOREM: forall cmd: runCommand(cmd) = lines ∨ EncodingError
// PURITY: SHELL
// EFFECT: Effect<ReadonlyArray<string>, EncodingError, EntropyService>
// INVARIANT: only keygen and key-less encrypt consume entropy
// COMPLEXITY: O(n)/O(n)
export const runCommand = (command: Command): Effect.Effect<Output, EncodingError, EntropyService> =>
  Effect.zipRight(Effect.logInfo(logCommand(command.kind)), dispatch(command))
