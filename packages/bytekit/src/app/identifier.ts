import { Clock, Effect, pipe } from "effect"

import type { StableUuid, UuidV7 } from "../core/brand.js"
import type { ResourceError } from "../core/errors.js"
import { hexEncode } from "../core/hex.js"
import { utf8Encode } from "../core/text.js"
import { formatUuidV7, stableUuidFromDigest, uuidRandomByteLength } from "../core/uuid.js"
import { Digest } from "../shell/digest.js"
import { Entropy } from "../shell/entropy.js"
import { Dispatch } from "./dispatch.js"

export { parseTimestamp } from "../core/uuid.js"

export const stablePartSeparator = "|"

// CHANGE: generate a time-ordered version-7 identifier
// WHY: identifiers sort by creation time and still carry 74 random bits
// QUOTE(TZ): "obtain current time in milliseconds since epoch (external clock collaborator) and 10 bytes of cryptographically strong randomness"
// REF: user-2026-10-12-bytekit
// SOURCE: https://www.rfc-editor.org/rfc/rfc9562#section-5.7
// FORMAT THEOREM: forall t: parseTimestamp(generate at t) = Some(t)
// PURITY: SHELL
// EFFECT: Effect<UuidV7, ResourceError, Entropy | Dispatch>
// INVARIANT: hex position 12 is "7" and hex position 16 is one of 8, 9, a, b
// COMPLEXITY: O(1)/O(1)
export const generate: Effect.Effect<UuidV7, ResourceError, Entropy | Dispatch> = Effect.gen(function*(_) {
  const dispatch = yield* _(Dispatch)
  const entropy = yield* _(Entropy)
  const now = yield* _(Clock.currentTimeMillis)
  const random = yield* _(entropy.draw(uuidRandomByteLength))
  return formatUuidV7(dispatch.identifier.layout.layoutUuidV7(now, random))
})

/**
 * Lowercase hex MD5 of the UTF-8 bytes of `content`.
 */
export const md5Hex = (content: string): Effect.Effect<string, ResourceError, Digest> =>
  Effect.flatMap(Digest, (digest) => pipe(digest.md5(utf8Encode(content)), Effect.map(hexEncode)))

// CHANGE: derive a deterministic identifier from ordered parts
// WHY: the same inputs must map to the same identifier across processes
// QUOTE(TZ): "empty parts returns empty-string sentinel; otherwise join parts with \"|\""
// REF: user-2026-10-12-bytekit
// SOURCE: n/a
// FORMAT THEOREM: forall p ≠ []: stableIdentifier(p) = upper(dashed(md5(utf8(join(p, "|")))))
// PURITY: SHELL
// EFFECT: Effect<StableUuid | "", ResourceError, Digest>
// INVARIANT: stableIdentifier([]) = "" and the digest is not consulted
// COMPLEXITY: O(n)/O(n)
export const stableIdentifier = (
  parts: ReadonlyArray<string>
): Effect.Effect<StableUuid | "", ResourceError, Digest> =>
  parts.length === 0
    ? Effect.succeed<StableUuid | "">("")
    : Effect.flatMap(Digest, (digest) =>
      pipe(
        digest.md5(utf8Encode(parts.join(stablePartSeparator))),
        Effect.map(stableUuidFromDigest)
      ))
