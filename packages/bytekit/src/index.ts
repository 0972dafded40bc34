import { bindCodec } from "./app/codec.js"
import { processSelection } from "./app/dispatch.js"

// Resolved once at import; DispatchLive provides this same selection.
export const defaultSelection = processSelection

export const {
  base64Decode,
  base64Encode,
  base64ToText,
  extractDigits,
  filterAscii,
  hexDecode,
  hexEncode,
  hexToText,
  isAscii,
  isBase64,
  isHebrew,
  isHex,
  isValidNationalId,
  textToBase64,
  textToHex,
  utf8Decode,
  utf8Encode
} = bindCodec(processSelection.codec)

export type { BoundCodec } from "./app/codec.js"
export { bindCodec } from "./app/codec.js"
export { formatError } from "./app/diagnostics.js"
export type { Candidate, DispatchCandidates, DispatchSelection, IdentifierStrategy } from "./app/dispatch.js"
export { defaultCandidates, Dispatch, DispatchLive, makeDispatchLayer, processSelection, resolveDispatch } from "./app/dispatch.js"
export { generate, md5Hex, parseTimestamp, stableIdentifier } from "./app/identifier.js"
export { BytekitLive, EntropyFromDispatch, layerFromSelection, makeBytekitLayer } from "./app/layer.js"
export { encryptPassword, hashPassword, matchPassword } from "./app/passwords.js"
export type { RandomIdOptions } from "./app/tokens.js"
export { generateRandomId, generateRandomToken, generateSecureToken } from "./app/tokens.js"
export type { Base64String, HexString, StableUuid, UuidV7 } from "./core/brand.js"
export type { CodecShape, EntropyShape, IdentifierLayout, ImplementationPath } from "./core/codec.js"
export { toDotCase } from "./core/dot-case.js"
export type { BytekitError } from "./core/errors.js"
export { FormatError, ResourceError, ValueError } from "./core/errors.js"
export type { Family } from "./core/probe.js"
export { ProbeFailure } from "./core/probe.js"
export type { KeyFn, MapKey, NestedRecord, NestedValue } from "./core/structure.js"
export { changeKeysCase, isStructuralContainer, sortKeysRecursively } from "./core/structure.js"
export type { TokenBase } from "./core/tokens.js"
export type { Config, EnvTarget, Preference } from "./shell/config.js"
export { ConfigError, loadConfig, loadConfigFrom } from "./shell/config.js"
export { Digest } from "./shell/digest.js"
export type { DigestShape } from "./shell/digest.js"
export { Entropy } from "./shell/entropy.js"
export { Kdf } from "./shell/kdf.js"
export type { KdfShape, ScryptParams } from "./shell/kdf.js"
