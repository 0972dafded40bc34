import * as S from "@effect/schema/Schema"
import { Effect, Either, Match, pipe } from "effect"

import { ResourceError, ValueError } from "../core/errors.js"
import { utf8Encode } from "../core/text.js"
import type { TokenBase } from "../core/tokens.js"
import { randomIdAlphabet, sampleAlphabet, secureTokenAlphabet, tokenAlphabets } from "../core/tokens.js"
import { Entropy } from "../shell/entropy.js"
import { Dispatch } from "./dispatch.js"

export const defaultSecureTokenLength = 24

// Consecutive draws that yield no accepted byte before the source is considered broken.
const maxBarrenDraws = 32
const minDrawSize = 8

const TokenBaseSchema = S.Literal("binary", "octal", "hex", "decimal", "base-64")

export type RandomIdOptions = {
  readonly symbols?: boolean
  readonly encoding?: "ascii" | "hex" | "base64"
  readonly case?: "upper" | "lower"
}

const checkLength = (length: number): Either.Either<number, ValueError> =>
  Number.isSafeInteger(length) && length >= 0
    ? Either.right(length)
    : Either.left(new ValueError({ message: `length must be a non-negative integer, got ${length}` }))

const decodeBase = (base: string): Either.Either<TokenBase, ValueError> =>
  Either.mapLeft(
    S.decodeUnknownEither(TokenBaseSchema)(base),
    () => new ValueError({ message: `invalid token base ${JSON.stringify(base)}` })
  )

// CHANGE: draw uniformly distributed characters from an alphabet
// WHY: modulo reduction over raw bytes would favor the first characters of most alphabets
// QUOTE(TZ): n/a
// REF: user-2026-10-12-bytekit
// SOURCE: n/a
// FORMAT THEOREM: forall a, n: |drawFromAlphabet(a, n)| = n ∧ chars ⊆ a
// PURITY: SHELL
// EFFECT: Effect<string, ResourceError, Entropy>
// INVARIANT: a source that keeps returning only rejected bytes fails instead of looping forever
// COMPLEXITY: O(n)/O(n)
export const drawFromAlphabet = (
  alphabet: string,
  length: number
): Effect.Effect<string, ResourceError, Entropy> =>
  Effect.gen(function*(_) {
    const entropy = yield* _(Entropy)
    let out = ""
    let barren = 0
    while (out.length < length) {
      const bytes = yield* _(entropy.draw(Math.max(minDrawSize, (length - out.length) * 2)))
      const sampled = sampleAlphabet(alphabet, bytes)
      barren = sampled.length === 0 ? barren + 1 : 0
      if (barren >= maxBarrenDraws) {
        return yield* _(
          Effect.fail(
            new ResourceError({ resource: `entropy:${entropy.path}`, message: "entropy source yields no usable bytes" })
          )
        )
      }
      out += sampled
    }
    return out.slice(0, length)
  })

export const generateRandomToken = (
  size: number,
  base: string
): Effect.Effect<string, ValueError | ResourceError, Entropy> =>
  Effect.gen(function*(_) {
    const length = yield* _(checkLength(size))
    const tokenBase = yield* _(decodeBase(base))
    return yield* _(drawFromAlphabet(tokenAlphabets[tokenBase], length))
  })

/**
 * Token over letters and digits without look-alike characters. A length of 0
 * selects the default length.
 */
export const generateSecureToken = (
  length: number = defaultSecureTokenLength
): Effect.Effect<string, ValueError | ResourceError, Entropy> =>
  pipe(
    checkLength(length),
    Effect.flatMap((checked) =>
      drawFromAlphabet(secureTokenAlphabet, checked === 0 ? defaultSecureTokenLength : checked)
    )
  )

const applyCase = (text: string, textCase: RandomIdOptions["case"]): string =>
  Match.value(textCase).pipe(
    Match.when("upper", () => text.toUpperCase()),
    Match.when("lower", () => text.toLowerCase()),
    Match.orElse(() => text)
  )

// CHANGE: generate a readable random identifier with optional re-encoding
// WHY: callers need ids that survive URLs, headers and case-insensitive stores
// QUOTE(TZ): n/a
// REF: user-2026-10-12-bytekit
// SOURCE: n/a
// FORMAT THEOREM: forall n: encoding = ascii ⇒ |generateRandomId(n)| = n
// PURITY: SHELL
// EFFECT: Effect<string, ValueError | ResourceError, Entropy | Dispatch>
// INVARIANT: hex and base64 encodings are taken over the UTF-8 bytes of the ascii id
// COMPLEXITY: O(n)/O(n)
export const generateRandomId = (
  length: number,
  options: RandomIdOptions = {}
): Effect.Effect<string, ValueError | ResourceError, Entropy | Dispatch> =>
  Effect.gen(function*(_) {
    const checked = yield* _(checkLength(length))
    const { codec } = yield* _(Dispatch)
    const raw = yield* _(drawFromAlphabet(randomIdAlphabet(options.symbols ?? false), checked))
    const encoded = Match.value(options.encoding ?? "ascii").pipe(
      Match.when("hex", (): string => codec.hexEncode(utf8Encode(raw))),
      Match.when("base64", (): string => codec.base64Encode(utf8Encode(raw))),
      Match.orElse(() => raw)
    )
    return applyCase(encoded, options.case)
  })
