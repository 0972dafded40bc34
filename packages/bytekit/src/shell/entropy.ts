import { randomBytes } from "node:crypto"

import { Context, Either, pipe } from "effect"

import type { EntropyShape, ImplementationPath } from "../core/codec.js"
import { describeThrown, ResourceError } from "../core/errors.js"

export class Entropy extends Context.Tag("Entropy")<
  Entropy,
  EntropyShape
>() {}

// Web Crypto refuses requests above 64 KiB per call.
const webQuota = 65_536

const toResourceError = (path: ImplementationPath) => (message: string): ResourceError =>
  new ResourceError({ resource: `entropy:${path}`, message })

const checkedDraw = (
  path: ImplementationPath,
  fill: (size: number) => Uint8Array
) =>
(size: number): Either.Either<Uint8Array, ResourceError> => {
  const fail = toResourceError(path)
  if (!Number.isSafeInteger(size) || size < 0) {
    return Either.left(fail(`invalid entropy request of ${size} bytes`))
  }
  return pipe(
    Either.try({
      try: () => fill(size),
      catch: (error) => fail(describeThrown(error))
    }),
    Either.flatMap((bytes) =>
      bytes.length === size
        ? Either.right(bytes)
        : Either.left(fail(`entropy source returned ${bytes.length} bytes, expected ${size}`))
    )
  )
}

const fillWeb = (size: number): Uint8Array => {
  const out = new Uint8Array(size)
  for (let offset = 0; offset < size; offset += webQuota) {
    globalThis.crypto.getRandomValues(out.subarray(offset, Math.min(size, offset + webQuota)))
  }
  return out
}

// CHANGE: expose the operating system CSPRNG through node:crypto
// WHY: identifier generation needs 10 strong random bytes per call
// QUOTE(TZ): "fails with ResourceError only if the randomness source is unavailable"
// REF: user-2026-10-12-bytekit
// SOURCE: https://nodejs.org/api/crypto.html#cryptorandombytessize-callback
// FORMAT THEOREM: forall n >= 0: Right(b) = draw(n) ⇒ |b| = n
// PURITY: SHELL
// EFFECT: Either<Uint8Array, ResourceError>
// INVARIANT: short reads are reported, never padded
// COMPLEXITY: O(n)/O(n)
export const nodeEntropy: EntropyShape = {
  path: "native",
  draw: checkedDraw("native", (size) => Uint8Array.from(randomBytes(size)))
}

export const webEntropy: EntropyShape = {
  path: "fallback",
  draw: checkedDraw("fallback", fillWeb)
}

export const makeEntropy = (path: ImplementationPath, fill: (size: number) => Uint8Array): EntropyShape => ({
  path,
  draw: checkedDraw(path, fill)
})
