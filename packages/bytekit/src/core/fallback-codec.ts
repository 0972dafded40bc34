import { base64Decode, base64Encode } from "./base64.js"
import { isValidNationalId } from "./checksum.js"
import type { CodecShape, IdentifierLayout } from "./codec.js"
import { hexDecode, hexEncode, isHex } from "./hex.js"
import { extractDigits, filterAscii, isAscii, isHebrew } from "./text.js"
import { layoutUuidV7 } from "./uuid.js"

// Portable strategy: plain TypeScript over Uint8Array and string code units.
export const fallbackCodec: CodecShape = {
  path: "fallback",
  hexEncode,
  hexDecode,
  base64Encode,
  base64Decode,
  isAscii,
  isHex,
  isHebrew,
  filterAscii,
  extractDigits,
  isValidNationalId
}

export const fallbackLayout: IdentifierLayout = {
  path: "fallback",
  layoutUuidV7
}
