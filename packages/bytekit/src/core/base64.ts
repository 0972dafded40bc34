import { Either } from "effect"

import { Base64String } from "./brand.js"
import { FormatError } from "./errors.js"

export const base64Alphabet = "ABCDEFGHIJKLMNOPQRSTUVWXYZabcdefghijklmnopqrstuvwxyz0123456789+/"

const padChar = 0x3d

// Sextet value of an ASCII code unit, or -1 when it is outside the standard alphabet.
export const sextetOf = (code: number): number => {
  if (code >= 0x41 && code <= 0x5a) {
    return code - 0x41
  }
  if (code >= 0x61 && code <= 0x7a) {
    return code - 0x61 + 26
  }
  if (code >= 0x30 && code <= 0x39) {
    return code - 0x30 + 52
  }
  if (code === 0x2b) {
    return 62
  }
  if (code === 0x2f) {
    return 63
  }
  return -1
}

const formatError = (message: string): FormatError => new FormatError({ operation: "base64Decode", message })

const countPadding = (text: string): number => {
  let padding = 0
  for (let index = text.length - 1; index >= 0 && text.charCodeAt(index) === padChar; index--) {
    padding++
  }
  return padding
}

const findInvalidSextet = (text: string, end: number): number => {
  for (let index = 0; index < end; index++) {
    if (sextetOf(text.charCodeAt(index)) < 0) {
      return index
    }
  }
  return -1
}

// Unused low bits of the last sextet must be zero in canonical base64.
const hasCanonicalTail = (text: string, padding: number): boolean => {
  if (padding === 0) {
    return true
  }
  const last = sextetOf(text.charCodeAt(text.length - padding - 1))
  const mask = padding === 1 ? 0x03 : 0x0f
  return (last & mask) === 0
}

/**
 * Checks a base64 string and returns the number of decoded bytes it holds.
 *
 * @pure true
 * @invariant Right(n) ⇒ n = 3 * length / 4 - padding
 * @complexity O(n) time / O(1) space
 */
export const validateBase64 = (text: string): Either.Either<number, FormatError> => {
  if (text.length % 4 !== 0) {
    return Either.left(formatError(`length ${text.length} is not a multiple of 4`))
  }
  const padding = countPadding(text)
  if (padding > 2) {
    return Either.left(formatError(`malformed padding (${padding} pad characters)`))
  }
  const invalidAt = findInvalidSextet(text, text.length - padding)
  if (invalidAt >= 0) {
    return Either.left(formatError(`invalid base64 character at index ${invalidAt}`))
  }
  if (!hasCanonicalTail(text, padding)) {
    return Either.left(formatError("non-zero bits before padding"))
  }
  return Either.right((text.length / 4) * 3 - padding)
}

// CHANGE: encode bytes as standard padded base64
// WHY: provide the portable path for base64Encode
// QUOTE(TZ): "standard alphabet with padding"
// REF: user-2026-10-12-bytekit
// SOURCE: n/a
// FORMAT THEOREM: forall b: length(base64Encode(b)) = 4 * ceil(length(b) / 3)
// PURITY: CORE
// INVARIANT: output length is a multiple of 4
// COMPLEXITY: O(n)/O(n)
export const base64Encode = (bytes: Uint8Array): Base64String => {
  let out = ""
  for (let index = 0; index < bytes.length; index += 3) {
    const remaining = bytes.length - index
    const b0 = bytes[index] ?? 0
    const b1 = bytes[index + 1] ?? 0
    const b2 = bytes[index + 2] ?? 0
    const triple = (b0 << 16) | (b1 << 8) | b2
    out += base64Alphabet.charAt((triple >>> 18) & 0x3f)
    out += base64Alphabet.charAt((triple >>> 12) & 0x3f)
    out += remaining > 1 ? base64Alphabet.charAt((triple >>> 6) & 0x3f) : "="
    out += remaining > 2 ? base64Alphabet.charAt(triple & 0x3f) : "="
  }
  return Base64String(out)
}

// CHANGE: decode canonical padded base64 into bytes
// WHY: provide the portable path for base64Decode with the shared validation rules
// QUOTE(TZ): "base64Decode fails with FormatError on malformed padding or invalid alphabet characters"
// REF: user-2026-10-12-bytekit
// SOURCE: n/a
// FORMAT THEOREM: forall b: base64Decode(base64Encode(b)) = Right(b)
// PURITY: CORE
// INVARIANT: input is fully validated before the output buffer is allocated
// COMPLEXITY: O(n)/O(n)
export const base64Decode = (text: string): Either.Either<Uint8Array, FormatError> =>
  Either.map(validateBase64(text), (size) => {
    const out = new Uint8Array(size)
    let offset = 0
    for (let index = 0; index < text.length; index += 4) {
      const s0 = sextetOf(text.charCodeAt(index))
      const s1 = sextetOf(text.charCodeAt(index + 1))
      const s2 = Math.max(0, sextetOf(text.charCodeAt(index + 2)))
      const s3 = Math.max(0, sextetOf(text.charCodeAt(index + 3)))
      const triple = (s0 << 18) | (s1 << 12) | (s2 << 6) | s3
      const chunk = [(triple >>> 16) & 0xff, (triple >>> 8) & 0xff, triple & 0xff]
      for (const byte of chunk) {
        if (offset < size) {
          out[offset] = byte
          offset++
        }
      }
    }
    return out
  })

export const isBase64 = (text: string): boolean =>
  Either.match(validateBase64(text), {
    onLeft: () => false,
    onRight: (size) => size > 0
  })
