import { scrypt, timingSafeEqual } from "node:crypto"

import { Context, Effect, Either, Layer } from "effect"

import { describeThrown, ResourceError } from "../core/errors.js"
import { utf8Encode } from "../core/text.js"

export type ScryptParams = {
  readonly cost: number
  readonly blockSize: number
  readonly parallelization: number
  readonly keyLength: number
}

export const passwordScryptParams: ScryptParams = {
  cost: 16_384,
  blockSize: 8,
  parallelization: 1,
  keyLength: 32
}

export type KdfShape = {
  readonly scrypt: (
    password: Uint8Array,
    salt: Uint8Array,
    params: ScryptParams
  ) => Effect.Effect<Uint8Array, ResourceError>
}

const toKdfError = <E>(error: E): ResourceError =>
  new ResourceError({ resource: "kdf:scrypt", message: describeThrown(error) })

export class Kdf extends Context.Tag("Kdf")<
  Kdf,
  KdfShape
>() {}

// CHANGE: derive keys with scrypt on the libuv thread pool
// WHY: password hashing invokes a KDF and never implements one
// QUOTE(TZ): n/a
// REF: user-2026-10-12-bytekit
// SOURCE: https://nodejs.org/api/crypto.html#cryptoscryptpassword-salt-keylen-options-callback
// FORMAT THEOREM: forall p, s, k: |scrypt(p, s, k)| = k.keyLength
// PURITY: SHELL
// EFFECT: Effect<Uint8Array, ResourceError>
// INVARIANT: callback errors and synchronous argument errors both become ResourceError
// COMPLEXITY: O(N * r)/O(N * r)
export const nodeKdf: KdfShape = {
  scrypt: (password, salt, params) =>
    Effect.async<Uint8Array, ResourceError>((resume) => {
      const started = Either.try({
        try: () =>
          scrypt(
            password,
            salt,
            params.keyLength,
            { N: params.cost, r: params.blockSize, p: params.parallelization },
            (error, key) =>
              resume(error === null ? Effect.succeed(Uint8Array.from(key)) : Effect.fail(toKdfError(error)))
          ),
        catch: toKdfError
      })
      if (Either.isLeft(started)) {
        resume(Effect.fail(started.left))
      }
    })
}

/**
 * Compares two strings over their UTF-8 bytes with `timingSafeEqual`. Only
 * the length check can exit early.
 */
export const constantTimeEqual = (left: string, right: string): boolean => {
  const leftBytes = utf8Encode(left)
  const rightBytes = utf8Encode(right)
  return leftBytes.length === rightBytes.length && timingSafeEqual(leftBytes, rightBytes)
}

export const KdfLive = Layer.succeed(Kdf, nodeKdf)
