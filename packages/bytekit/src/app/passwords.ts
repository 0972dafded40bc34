import { Effect, pipe } from "effect"

import type { ResourceError } from "../core/errors.js"
import { hexEncode } from "../core/hex.js"
import { utf8Encode } from "../core/text.js"
import { Entropy } from "../shell/entropy.js"
import { constantTimeEqual, Kdf, passwordScryptParams } from "../shell/kdf.js"

export const passwordHashLength = passwordScryptParams.keyLength * 2
export const saltByteLength = 16

// CHANGE: derive a password hash with scrypt over UTF-8 password and salt
// WHY: stored hashes must be reproducible from the password and its salt alone
// QUOTE(TZ): n/a
// REF: user-2026-10-12-bytekit
// SOURCE: n/a
// FORMAT THEOREM: forall p, s: |encryptPassword(p, s)| = 64
// PURITY: SHELL
// EFFECT: Effect<string, ResourceError, Kdf>
// INVARIANT: output is lowercase hex
// COMPLEXITY: O(N * r)/O(N * r)
export const encryptPassword = (password: string, salt: string): Effect.Effect<string, ResourceError, Kdf> =>
  Effect.flatMap(Kdf, (kdf) =>
    pipe(
      kdf.scrypt(utf8Encode(password), utf8Encode(salt), passwordScryptParams),
      Effect.map(hexEncode)
    ))

export const hashPassword = (password: string): Effect.Effect<string, ResourceError, Kdf | Entropy> =>
  Effect.gen(function*(_) {
    const entropy = yield* _(Entropy)
    const salt = hexEncode(yield* _(entropy.draw(saltByteLength)))
    const hash = yield* _(encryptPassword(password, salt))
    return `${hash}${salt}`
  })

// CHANGE: check a password against a stored hash-plus-salt value
// WHY: the salt travels with the hash, so verification needs no extra storage
// QUOTE(TZ): n/a
// REF: user-2026-10-12-bytekit
// SOURCE: n/a
// FORMAT THEOREM: forall p: matchPassword(p, hashPassword(p)) = true
// PURITY: SHELL
// EFFECT: Effect<boolean, ResourceError, Kdf>
// INVARIANT: stored values shorter than the hash never match and never reach the KDF
// COMPLEXITY: O(N * r)/O(N * r)
export const matchPassword = (password: string, stored: string): Effect.Effect<boolean, ResourceError, Kdf> =>
  stored.length < passwordHashLength
    ? Effect.succeed(false)
    : pipe(
      encryptPassword(password, stored.slice(passwordHashLength)),
      Effect.map((current) => constantTimeEqual(current, stored.slice(0, passwordHashLength)))
    )
