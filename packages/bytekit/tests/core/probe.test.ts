import { describe, expect, it } from "@effect/vitest"
import { Either } from "effect"

import { HexString } from "../../src/core/brand.js"
import type { CodecShape, EntropyShape } from "../../src/core/codec.js"
import { fallbackCodec, fallbackLayout } from "../../src/core/fallback-codec.js"
import { probeCodec, probeIdentifier } from "../../src/core/probe.js"
import { makeEntropy } from "../../src/shell/entropy.js"
import { leftOf } from "./property-helpers.js"

const zeroEntropy: EntropyShape = makeEntropy("fallback", (size) => new Uint8Array(size))

describe("probes", () => {
  it("accepts the fallback codec", () => {
    expect(Either.isRight(probeCodec(fallbackCodec))).toBe(true)
  })

  it("names the first wrong answer", () => {
    const wrong: CodecShape = { ...fallbackCodec, hexEncode: () => HexString("0000") }
    const failure = leftOf(probeCodec(wrong))
    expect(failure.family).toBe("codec")
    expect(failure.message).toBe("known-answer check hexEncode failed")
  })

  it("captures thrown errors", () => {
    const throwing: CodecShape = {
      ...fallbackCodec,
      isValidNationalId: () => {
        throw new Error("bindings missing")
      }
    }
    expect(leftOf(probeCodec(throwing)).message).toBe("bindings missing")
  })

  it("checks the identifier layout and an entropy draw", () => {
    expect(Either.isRight(probeIdentifier(fallbackLayout, zeroEntropy))).toBe(true)
    const short = makeEntropy("fallback", () => new Uint8Array(4))
    const failure = leftOf(probeIdentifier(fallbackLayout, short))
    expect(failure.family).toBe("identifier")
    expect(failure.message).toBe("known-answer check entropy failed")
  })
})
