import { Buffer } from "node:buffer"

import { Either } from "effect"

import { validateBase64 } from "../core/base64.js"
import { Base64String, HexString } from "../core/brand.js"
import { nationalIdWidth } from "../core/checksum.js"
import type { CodecShape, IdentifierLayout } from "../core/codec.js"
import type { FormatError } from "../core/errors.js"
import { nibbleOf, validateHex } from "../core/hex.js"
import { uuidByteLength, uuidRandomByteLength, variantBits, versionNibble } from "../core/uuid.js"

const asBuffer = (bytes: Uint8Array): Buffer => Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength)

// Small buffers share Node's allocation pool; callers get an owned plain Uint8Array.
const asBytes = (buffer: Buffer): Uint8Array => Uint8Array.from(buffer)

const utf8Of = (text: string): Buffer => Buffer.from(text, "utf8")

const isDigitByte = (byte: number): boolean => byte >= 0x30 && byte <= 0x39

const keepBytes = (text: string, keep: (byte: number) => boolean): string =>
  Buffer.from(utf8Of(text).filter(keep)).toString("latin1")

const hexDecode = (text: string): Either.Either<Uint8Array, FormatError> =>
  Either.map(validateHex(text), (valid) => asBytes(Buffer.from(valid, "hex")))

const base64Decode = (text: string): Either.Either<Uint8Array, FormatError> =>
  Either.map(validateBase64(text), () => asBytes(Buffer.from(text, "base64")))

// U+0590..U+05FF is encoded as D6 90..D6 BF and D7 80..D7 BF.
const isHebrewPair = (lead: number, trail: number): boolean =>
  (lead === 0xd6 && trail >= 0x90 && trail <= 0xbf) || (lead === 0xd7 && trail >= 0x80 && trail <= 0xbf)

const isHebrew = (text: string): boolean => {
  const bytes = utf8Of(text)
  for (let index = 0; index + 1 < bytes.length; index++) {
    if (isHebrewPair(bytes[index] ?? 0, bytes[index + 1] ?? 0)) {
      return true
    }
  }
  return false
}

// Digits are ASCII bytes, so the byte length equals the character length of any valid ID.
const isValidNationalId = (text: string): boolean => {
  const bytes = utf8Of(text)
  if (bytes.length === 0 || bytes.length > nationalIdWidth || !bytes.every(isDigitByte)) {
    return false
  }
  const padded = Buffer.alloc(nationalIdWidth, 0x30)
  bytes.copy(padded, nationalIdWidth - bytes.length)
  let total = 0
  for (let index = 0; index < nationalIdWidth; index++) {
    const step = ((padded[index] ?? 0x30) - 0x30) * (1 + (index % 2))
    total += step > 9 ? step - 9 : step
  }
  return total % 10 === 0
}

// CHANGE: implement the codec contract over Node buffers
// WHY: the native path delegates byte work to the runtime's buffer bindings
// QUOTE(TZ): "a native path that works over raw byte buffers"
// REF: user-2026-10-12-bytekit
// SOURCE: https://nodejs.org/api/buffer.html "Buffers and character encodings"
// FORMAT THEOREM: forall t: nativeCodec.op(t) = fallbackCodec.op(t)
// PURITY: SHELL
// EFFECT: none; every member is synchronous and total
// INVARIANT: decoders share the fallback validators, so error tags and messages agree
// COMPLEXITY: O(n)/O(n)
export const nativeCodec: CodecShape = {
  path: "native",
  hexEncode: (bytes) => HexString(asBuffer(bytes).toString("hex")),
  hexDecode,
  base64Encode: (bytes) => Base64String(asBuffer(bytes).toString("base64")),
  base64Decode,
  isAscii: (text) => utf8Of(text).every((byte) => byte < 0x80),
  isHex: (text) => text.length > 0 && utf8Of(text).every((byte) => nibbleOf(byte) >= 0),
  isHebrew,
  filterAscii: (text) => keepBytes(text, (byte) => byte < 0x80),
  extractDigits: (text) => keepBytes(text, isDigitByte),
  isValidNationalId
}

const timestampBytes = 6
const timestampModulus = 2 ** 48

export const nativeLayout: IdentifierLayout = {
  path: "native",
  layoutUuidV7: (timestampMs, random) => {
    const out = Buffer.alloc(uuidByteLength)
    const reduced = ((Math.floor(timestampMs) % timestampModulus) + timestampModulus) % timestampModulus
    out.writeUIntBE(reduced, 0, timestampBytes)
    asBuffer(random).copy(out, timestampBytes, 0, uuidRandomByteLength)
    out[6] = versionNibble | ((out[6] ?? 0) & 0x0f)
    out[8] = variantBits | ((out[8] ?? 0) & 0x3f)
    return asBytes(out)
  }
}
