import { Either, pipe } from "effect"

import { isBase64 } from "../core/base64.js"
import type { CodecShape } from "../core/codec.js"
import type { FormatError } from "../core/errors.js"
import { utf8Decode, utf8Encode } from "../core/text.js"

export type BoundCodec = Omit<CodecShape, "path"> & {
  readonly isBase64: (text: string) => boolean
  readonly utf8Encode: (text: string) => Uint8Array
  readonly utf8Decode: (bytes: Uint8Array) => Either.Either<string, FormatError>
  readonly textToHex: (text: string) => string
  readonly hexToText: (hex: string) => Either.Either<string, FormatError>
  readonly textToBase64: (text: string) => string
  readonly base64ToText: (text: string) => Either.Either<string, FormatError>
}

// CHANGE: expose a selected codec together with its text conveniences
// WHY: text helpers must go through the same path as the byte operations they wrap
// QUOTE(TZ): n/a
// REF: user-2026-10-12-bytekit
// SOURCE: n/a
// FORMAT THEOREM: forall t: hexToText(textToHex(t)) = Right(t)
// PURITY: CORE
// INVARIANT: invalid UTF-8 after a successful decode is a FormatError, never U+FFFD
// COMPLEXITY: O(n)/O(n)
export const bindCodec = (codec: CodecShape): BoundCodec => ({
  hexEncode: codec.hexEncode,
  hexDecode: codec.hexDecode,
  base64Encode: codec.base64Encode,
  base64Decode: codec.base64Decode,
  isAscii: codec.isAscii,
  isHex: codec.isHex,
  isHebrew: codec.isHebrew,
  filterAscii: codec.filterAscii,
  extractDigits: codec.extractDigits,
  isValidNationalId: codec.isValidNationalId,
  isBase64,
  utf8Encode,
  utf8Decode,
  textToHex: (text) => codec.hexEncode(utf8Encode(text)),
  hexToText: (hex) => pipe(codec.hexDecode(hex), Either.flatMap(utf8Decode)),
  textToBase64: (text) => codec.base64Encode(utf8Encode(text)),
  base64ToText: (text) => pipe(codec.base64Decode(text), Either.flatMap(utf8Decode))
})
