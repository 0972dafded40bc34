import { Data, Either, pipe } from "effect"

import type { CodecShape, EntropyShape, IdentifierLayout } from "./codec.js"
import { describeThrown } from "./errors.js"
import { hexEncode } from "./hex.js"

export type Family = "codec" | "identifier"

export class ProbeFailure extends Data.TaggedError("ProbeFailure")<{
  readonly family: Family
  readonly message: string
}> {}

type KnownAnswer = {
  readonly name: string
  readonly passes: () => boolean
}

const sameBytes = (left: Uint8Array, right: Uint8Array): boolean =>
  left.length === right.length && left.every((byte, index) => byte === right[index])

const decodesTo = (decoded: Either.Either<Uint8Array, object>, expected: Uint8Array): boolean =>
  Either.match(decoded, {
    onLeft: () => false,
    onRight: (bytes) => sameBytes(bytes, expected)
  })

const ab = Uint8Array.of(0x61, 0x62)

const codecAnswers = (codec: CodecShape): ReadonlyArray<KnownAnswer> => [
  { name: "hexEncode", passes: () => codec.hexEncode(ab) === "6162" },
  { name: "hexDecode", passes: () => decodesTo(codec.hexDecode("6162"), ab) },
  { name: "base64Encode", passes: () => codec.base64Encode(ab) === "YWI=" },
  { name: "base64Decode", passes: () => decodesTo(codec.base64Decode("YWI="), ab) },
  { name: "isValidNationalId", passes: () => codec.isValidNationalId("000000018") }
]

const probeTimestamp = 0x01_02_03_04_05_06
const probeRandom = new Uint8Array(10).fill(0xff)
const probeLayoutHex = "0102030405067fffbfffffffffffffff"
const probeDrawSize = 16

const identifierAnswers = (layout: IdentifierLayout, entropy: EntropyShape): ReadonlyArray<KnownAnswer> => [
  {
    name: "layoutUuidV7",
    passes: () => hexEncode(layout.layoutUuidV7(probeTimestamp, probeRandom)) === probeLayoutHex
  },
  {
    name: "entropy",
    passes: () =>
      Either.match(entropy.draw(probeDrawSize), {
        onLeft: () => false,
        onRight: (bytes) => bytes.length === probeDrawSize
      })
  }
]

const runAnswers = (family: Family, answers: () => ReadonlyArray<KnownAnswer>): Either.Either<void, ProbeFailure> =>
  pipe(
    Either.try({
      try: () => answers().find((answer) => !answer.passes()),
      catch: (error) => new ProbeFailure({ family, message: describeThrown(error) })
    }),
    Either.flatMap((failed) =>
      failed === undefined
        ? Either.right(undefined)
        : Either.left(new ProbeFailure({ family, message: `known-answer check ${failed.name} failed` }))
    )
  )

// CHANGE: verify a codec strategy against fixed known answers
// WHY: a native path that loads but computes wrong values must not be selected
// QUOTE(TZ): "If the native path is unavailable or fails its probe, the fallback is used silently"
// REF: user-2026-10-12-bytekit
// SOURCE: n/a
// FORMAT THEOREM: forall c: Right(probeCodec(c)) ⇒ c.hexEncode("ab") = "6162"
// PURITY: CORE
// INVARIANT: thrown errors become ProbeFailure, never escape
// COMPLEXITY: O(1)/O(1)
export const probeCodec = (codec: CodecShape): Either.Either<void, ProbeFailure> =>
  runAnswers("codec", () => codecAnswers(codec))

export const probeIdentifier = (
  layout: IdentifierLayout,
  entropy: EntropyShape
): Either.Either<void, ProbeFailure> => runAnswers("identifier", () => identifierAnswers(layout, entropy))
