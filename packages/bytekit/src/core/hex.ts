import { Either } from "effect"

import { HexString } from "./brand.js"
import { FormatError } from "./errors.js"

const hexDigits = "0123456789abcdef"

// Nibble value of an ASCII code unit, or -1 when it is not a hex digit.
export const nibbleOf = (code: number): number => {
  if (code >= 0x30 && code <= 0x39) {
    return code - 0x30
  }
  if (code >= 0x61 && code <= 0x66) {
    return code - 0x61 + 10
  }
  if (code >= 0x41 && code <= 0x46) {
    return code - 0x41 + 10
  }
  return -1
}

// CHANGE: encode bytes as lowercase hex, high nibble first
// WHY: provide the portable path for hexEncode
// QUOTE(TZ): "produces two lowercase hex characters per input unit, high nibble first"
// REF: user-2026-10-12-bytekit
// SOURCE: n/a
// FORMAT THEOREM: forall b: length(hexEncode(b)) = 2 * length(b)
// PURITY: CORE
// INVARIANT: output only contains [0-9a-f]
// COMPLEXITY: O(n)/O(n)
export const hexEncode = (bytes: Uint8Array): HexString => {
  let out = ""
  for (const byte of bytes) {
    out += hexDigits.charAt(byte >>> 4) + hexDigits.charAt(byte & 0x0f)
  }
  return HexString(out)
}

/**
 * Index of the first character that is not a hex digit, or -1.
 *
 * @pure true
 * @complexity O(n) time / O(1) space
 */
export const firstNonHexIndex = (text: string): number => {
  for (let index = 0; index < text.length; index++) {
    if (nibbleOf(text.charCodeAt(index)) < 0) {
      return index
    }
  }
  return -1
}

export const isHex = (text: string): boolean => text.length > 0 && firstNonHexIndex(text) < 0

export const validateHex = (text: string): Either.Either<string, FormatError> => {
  if (text.length % 2 !== 0) {
    return Either.left(
      new FormatError({ operation: "hexDecode", message: `odd-length hex string (${text.length} characters)` })
    )
  }
  const invalidAt = firstNonHexIndex(text)
  return invalidAt < 0
    ? Either.right(text)
    : Either.left(
      new FormatError({ operation: "hexDecode", message: `invalid hex character at index ${invalidAt}` })
    )
}

// CHANGE: decode hex text into bytes after validating the whole input
// WHY: decoders validate before allocating output
// QUOTE(TZ): "fails with FormatError if text length is odd or contains a character outside [0-9a-fA-F]"
// REF: user-2026-10-12-bytekit
// SOURCE: n/a
// FORMAT THEOREM: forall b: hexDecode(hexEncode(b)) = Right(b)
// PURITY: CORE
// INVARIANT: Right(bytes) ⇒ length(bytes) = length(text) / 2
// COMPLEXITY: O(n)/O(n)
export const hexDecode = (text: string): Either.Either<Uint8Array, FormatError> =>
  Either.map(validateHex(text), (valid) => {
    const out = new Uint8Array(valid.length / 2)
    for (let index = 0; index < out.length; index++) {
      const high = nibbleOf(valid.charCodeAt(index * 2))
      const low = nibbleOf(valid.charCodeAt(index * 2 + 1))
      out[index] = (high << 4) | low
    }
    return out
  })
