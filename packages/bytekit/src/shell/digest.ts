import { createHash } from "node:crypto"

import { Context, Effect, Layer } from "effect"

import { describeThrown, ResourceError } from "../core/errors.js"

export type DigestShape = {
  readonly md5: (bytes: Uint8Array) => Effect.Effect<Uint8Array, ResourceError>
}

export class Digest extends Context.Tag("Digest")<
  Digest,
  DigestShape
>() {}

// CHANGE: compute MD5 digests through node:crypto
// WHY: stable identifiers need a 128-bit one-way hash and the library does not implement one
// QUOTE(TZ): "hash the UTF-8 bytes with a one-way hash (collaborator, e.g., a 128-bit message digest)"
// REF: user-2026-10-12-bytekit
// SOURCE: https://nodejs.org/api/crypto.html#cryptocreatehashalgorithm-options
// FORMAT THEOREM: forall b: |md5(b)| = 16
// PURITY: SHELL
// EFFECT: Effect<Uint8Array, ResourceError>
// INVARIANT: platforms without MD5 (FIPS mode) surface a ResourceError
// COMPLEXITY: O(n)/O(1)
export const nodeDigest: DigestShape = {
  md5: (bytes) =>
    Effect.try({
      try: () => Uint8Array.from(createHash("md5").update(bytes).digest()),
      catch: (error) => new ResourceError({ resource: "digest:md5", message: describeThrown(error) })
    })
}

export const DigestLive = Layer.succeed(Digest, nodeDigest)
