import type { Either } from "effect"

import type { Base64String, HexString } from "./brand.js"
import type { FormatError, ResourceError } from "./errors.js"

export type ImplementationPath = "native" | "fallback"

/**
 * Byte codec and checksum operations shared by the native and fallback paths.
 *
 * Every implementation must return identical values and identical error tags
 * for identical inputs; `tests/conformance` runs one suite against each.
 */
export type CodecShape = {
  readonly path: ImplementationPath
  readonly hexEncode: (bytes: Uint8Array) => HexString
  readonly hexDecode: (text: string) => Either.Either<Uint8Array, FormatError>
  readonly base64Encode: (bytes: Uint8Array) => Base64String
  readonly base64Decode: (text: string) => Either.Either<Uint8Array, FormatError>
  readonly isAscii: (text: string) => boolean
  readonly isHex: (text: string) => boolean
  readonly isHebrew: (text: string) => boolean
  readonly filterAscii: (text: string) => string
  readonly extractDigits: (text: string) => string
  readonly isValidNationalId: (text: string) => boolean
}

/**
 * Big-endian layout of a version-7 identifier from a millisecond timestamp and
 * 10 random bytes.
 */
export type IdentifierLayout = {
  readonly path: ImplementationPath
  readonly layoutUuidV7: (timestampMs: number, random: Uint8Array) => Uint8Array
}

/**
 * Synchronous source of cryptographically strong random bytes.
 *
 * A draw that fails, or returns fewer bytes than asked for, is a
 * `ResourceError`.
 */
export type EntropyShape = {
  readonly path: ImplementationPath
  readonly draw: (size: number) => Either.Either<Uint8Array, ResourceError>
}
