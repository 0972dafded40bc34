// CHANGE: introduce branded text types for codec and identifier outputs
// WHY: keep validated hex, base64 and identifier text distinct from arbitrary strings without unsafe casts
// QUOTE(TZ): "hex textual representation always has even length and uses only the 16 lowercase hex symbols"
// REF: user-2026-10-12-bytekit
// SOURCE: n/a
// FORMAT THEOREM: forall x in Domain: brand(x) -> preserves(value(x))
// PURITY: CORE
// INVARIANT: brands are only created by the operations that validated or produced the text
// COMPLEXITY: O(1)/O(1)
export type Brand<T, Name extends string> = T & { readonly __brand: Name }

export type HexString = Brand<string, "HexString">
export type Base64String = Brand<string, "Base64String">
export type UuidV7 = Brand<string, "UuidV7">
export type StableUuid = Brand<string, "StableUuid">
export type NationalIdDigits = Brand<string, "NationalIdDigits">

// CHANGE: provide constructors for codec output brands
// WHY: encoders produce well-formed text by construction
// QUOTE(TZ): n/a
// REF: user-2026-10-12-bytekit
// SOURCE: n/a
// FORMAT THEOREM: forall s in String: HexString(s) = s
// PURITY: CORE
// INVARIANT: branding does not change runtime representation
// COMPLEXITY: O(1)/O(1)
export const HexString = (value: string): HexString => value as HexString

export const Base64String = (value: string): Base64String => value as Base64String

// CHANGE: provide constructors for identifier brands
// WHY: generated and content-derived identifiers must not be mixed by accident
// QUOTE(TZ): "lowercase for generation, uppercase for the content-derived variant"
// REF: user-2026-10-12-bytekit
// SOURCE: n/a
// FORMAT THEOREM: forall s in String: UuidV7(s) = s ∧ StableUuid(s) = s
// PURITY: CORE
// INVARIANT: identifier text stays unchanged
// COMPLEXITY: O(1)/O(1)
export const UuidV7 = (value: string): UuidV7 => value as UuidV7

export const StableUuid = (value: string): StableUuid => value as StableUuid

export const NationalIdDigits = (value: string): NationalIdDigits => value as NationalIdDigits
