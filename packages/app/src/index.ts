export type { RingElement } from "./core/brand.js"
export { latinAlphabet, modulus } from "./core/alphabet.js"
export { RngSeed } from "./core/axioms.js"
export { bruteForce, type Candidate, type Cipher, decrypt, encrypt, shiftCipher } from "./core/cipher.js"
export { EncodingError, type EncodingErrorReason, EncodingTableDefect } from "./core/errors.js"
export { allKeys, insecureExport, type Key, keyEquals, parseKey, randomKey } from "./core/key.js"
export { add, fromCanonicalized, fromChar, isZero, randomRingElement, ringValue, sub, toChar, zero } from "./core/ring.js"
export { type EntropySource, nextSeed, seededSource, uniformBelow } from "./core/rng.js"
export {
  type Ciphertext,
  ciphertextEquals,
  ciphertextFromElements,
  type Message,
  messageEquals,
  messageFromElements,
  parseCiphertext,
  parseMessage,
  renderCiphertext,
  renderMessage
} from "./core/texts.js"
export { cryptoEntropySource } from "./shell/entropy.js"
