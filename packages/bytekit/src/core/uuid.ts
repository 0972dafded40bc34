import { Either, Option, pipe } from "effect"

import { StableUuid, UuidV7 } from "./brand.js"
import { FormatError } from "./errors.js"
import { firstNonHexIndex, hexEncode } from "./hex.js"

export const uuidByteLength = 16
export const uuidRandomByteLength = 10
export const uuidHexLength = 32

const timestampHexLength = 12
const timestampModulus = 2 ** 48

export const versionNibble = 0x70
export const variantBits = 0x80

export type HexCase = "lower" | "upper"

/**
 * Lays out a version-7 identifier from a millisecond timestamp and 10 random
 * bytes.
 *
 * Bytes 0-5 carry the timestamp big-endian (reduced modulo 2^48). The high
 * nibble of byte 6 and the top two bits of byte 8 are overlaid with the version
 * and variant tags; everything else is random input.
 *
 * @pure true
 * @invariant (out[6] & 0xf0) === 0x70 ∧ (out[8] & 0xc0) === 0x80
 * @complexity O(1) time / O(1) space
 */
export const layoutUuidV7 = (timestampMs: number, random: Uint8Array): Uint8Array => {
  const out = new Uint8Array(uuidByteLength)
  let remaining = ((Math.floor(timestampMs) % timestampModulus) + timestampModulus) % timestampModulus
  for (let index = 5; index >= 0; index--) {
    out[index] = remaining % 256
    remaining = Math.floor(remaining / 256)
  }
  out[6] = versionNibble | ((random[0] ?? 0) & 0x0f)
  out[7] = random[1] ?? 0
  out[8] = variantBits | ((random[2] ?? 0) & 0x3f)
  for (let index = 3; index < uuidRandomByteLength; index++) {
    out[6 + index] = random[index] ?? 0
  }
  return out
}

// CHANGE: render 16 bytes as canonical dashed hex
// WHY: both identifier kinds share the 8-4-4-4-12 grouping and differ only in case
// QUOTE(TZ): "textual form is the canonical dashed hexadecimal grouping (8-4-4-4-12 hex digits)"
// REF: user-2026-10-12-bytekit
// SOURCE: n/a
// FORMAT THEOREM: forall b (|b| = 16): length(formatDashed(b)) = 36
// PURITY: CORE
// INVARIANT: dashes sit at indices 8, 13, 18 and 23
// COMPLEXITY: O(1)/O(1)
export const formatDashed = (bytes: Uint8Array, hexCase: HexCase): string => {
  const hex = hexEncode(bytes.subarray(0, uuidByteLength))
  const dashed = [
    hex.slice(0, 8),
    hex.slice(8, 12),
    hex.slice(12, 16),
    hex.slice(16, 20),
    hex.slice(20, 32)
  ].join("-")
  return hexCase === "upper" ? dashed.toUpperCase() : dashed
}

export const formatUuidV7 = (bytes: Uint8Array): UuidV7 => UuidV7(formatDashed(bytes, "lower"))

export const stableUuidFromDigest = (digest: Uint8Array): StableUuid => StableUuid(formatDashed(digest, "upper"))

const formatError = (message: string): FormatError => new FormatError({ operation: "parseTimestamp", message })

const parseTimestampHex = (clean: string): Either.Either<Date, FormatError> => {
  if (clean.length !== uuidHexLength) {
    return Either.left(formatError(`invalid identifier length ${clean.length}, expected ${uuidHexLength}`))
  }
  const prefix = clean.slice(0, timestampHexLength)
  return firstNonHexIndex(prefix) < 0
    ? Either.right(new Date(Number.parseInt(prefix, 16)))
    : Either.left(formatError("timestamp prefix is not hex"))
}

// CHANGE: extract the UTC timestamp from a version-7 identifier
// WHY: the first 48 bits are the generation time in milliseconds
// QUOTE(TZ): "An empty input string returns an explicit \"no value\" result rather than an error."
// REF: user-2026-10-12-bytekit
// SOURCE: n/a
// FORMAT THEOREM: forall t, r: parseTimestamp(format(layout(t, r))) = Right(Some(Date(t)))
// PURITY: CORE
// INVARIANT: "" ↦ Right(None); stripped length ≠ 32 ↦ Left(FormatError)
// COMPLEXITY: O(n)/O(n)
export const parseTimestamp = (text: string): Either.Either<Option.Option<Date>, FormatError> =>
  text.length === 0
    ? Either.right(Option.none())
    : pipe(
      parseTimestampHex(text.replaceAll("-", "")),
      Either.map((date) => Option.some(date))
    )
