import { describe, expect, it } from "@effect/vitest"
import { Either } from "effect"
import fc from "fast-check"

import type { CodecShape, IdentifierLayout } from "../../src/core/codec.js"
import type { FormatError } from "../../src/core/errors.js"
import { fallbackCodec, fallbackLayout } from "../../src/core/fallback-codec.js"
import { nativeCodec, nativeLayout } from "../../src/shell/native-codec.js"
import {
  anyText,
  bytesArb,
  hexChar,
  leftOf,
  randomTenArb,
  rightOf,
  timestampArb,
  utf8
} from "../core/property-helpers.js"

const codecs: ReadonlyArray<readonly [string, CodecShape]> = [
  ["fallback", fallbackCodec],
  ["native", nativeCodec]
]

const layouts: ReadonlyArray<readonly [string, IdentifierLayout]> = [
  ["fallback", fallbackLayout],
  ["native", nativeLayout]
]

const describeError = (error: FormatError): string => `${error._tag} ${error.operation}: ${error.message}`

const outcome = (result: Either.Either<Uint8Array, FormatError>): string =>
  Either.match(result, {
    onLeft: describeError,
    onRight: (bytes) => `bytes ${Array.from(bytes).join(",")}`
  })

const malformedHex = ["abc", "zz", "0g", "12 4"]
const malformedBase64 = ["Zm9", "Z===", "Zm=v", "Zm9-", "Zh==", "Zm9v\n"]

describe.each(codecs)("%s codec", (_name, codec) => {
  it("matches the hex fixtures", () => {
    expect(codec.hexEncode(utf8("ab"))).toBe("6162")
    expect(rightOf(codec.hexDecode("6162"))).toEqual(utf8("ab"))
    expect(rightOf(codec.hexDecode("DEADbeef"))).toEqual(Uint8Array.of(0xde, 0xad, 0xbe, 0xef))
    expect(codec.isHex("6162")).toBe(true)
    expect(codec.isHex("61g2")).toBe(false)
    expect(codec.isHex("")).toBe(false)
    expect(codec.isHex("6é")).toBe(false)
  })

  it("matches the base64 fixtures", () => {
    expect(codec.base64Encode(utf8("foobar"))).toBe("Zm9vYmFy")
    expect(codec.base64Encode(utf8("f"))).toBe("Zg==")
    expect(rightOf(codec.base64Decode("Zm8="))).toEqual(utf8("fo"))
    expect(rightOf(codec.base64Decode(""))).toEqual(new Uint8Array(0))
  })

  it("reports the same errors as the fallback path", () => {
    for (const text of malformedHex) {
      expect(describeError(leftOf(codec.hexDecode(text)))).toBe(describeError(leftOf(fallbackCodec.hexDecode(text))))
    }
    for (const text of malformedBase64) {
      expect(describeError(leftOf(codec.base64Decode(text)))).toBe(
        describeError(leftOf(fallbackCodec.base64Decode(text)))
      )
    }
  })

  it("classifies text", () => {
    expect(codec.isAscii("")).toBe(true)
    expect(codec.isAscii("héllo")).toBe(false)
    expect(codec.isHebrew("abc שלום")).toBe(true)
    expect(codec.isHebrew("\u05ff")).toBe(true)
    expect(codec.isHebrew("\u0600")).toBe(false)
    expect(codec.filterAscii("héllo wörld")).toBe("hllo wrld")
    expect(codec.extractDigits("a1b2\u06633")).toBe("123")
  })

  it("validates national ids", () => {
    expect(codec.isValidNationalId("000000018")).toBe(true)
    expect(codec.isValidNationalId("123456782")).toBe(true)
    expect(codec.isValidNationalId("123456789")).toBe(false)
    expect(codec.isValidNationalId("")).toBe(false)
    expect(codec.isValidNationalId("12a456789")).toBe(false)
    expect(codec.isValidNationalId("1234567890")).toBe(false)
  })

  it("round-trips bytes", () => {
    fc.assert(
      fc.property(bytesArb, (bytes) => {
        expect(rightOf(codec.hexDecode(codec.hexEncode(bytes)))).toEqual(bytes)
        expect(rightOf(codec.base64Decode(codec.base64Encode(bytes)))).toEqual(bytes)
      })
    )
  })

  it("decodes mixed-case hex like the fallback path", () => {
    fc.assert(
      fc.property(fc.array(hexChar, { maxLength: 20 }), (chars) => {
        const text = chars.join("")
        expect(Either.isRight(codec.hexDecode(text))).toBe(text.length % 2 === 0)
        expect(outcome(codec.hexDecode(text))).toBe(outcome(fallbackCodec.hexDecode(text)))
      })
    )
  })

  it("agrees with the fallback path on arbitrary text", () => {
    fc.assert(
      fc.property(anyText, (text) => {
        expect(codec.isAscii(text)).toBe(fallbackCodec.isAscii(text))
        expect(codec.isHex(text)).toBe(fallbackCodec.isHex(text))
        expect(codec.isHebrew(text)).toBe(fallbackCodec.isHebrew(text))
        expect(codec.filterAscii(text)).toBe(fallbackCodec.filterAscii(text))
        expect(codec.extractDigits(text)).toBe(fallbackCodec.extractDigits(text))
        expect(codec.isValidNationalId(text)).toBe(fallbackCodec.isValidNationalId(text))
      })
    )
  })

  it("agrees with the fallback path on digit strings", () => {
    fc.assert(
      fc.property(fc.stringMatching(/^[0-9]{0,10}$/), (text) => {
        expect(codec.isValidNationalId(text)).toBe(fallbackCodec.isValidNationalId(text))
      })
    )
  })
})

describe.each(layouts)("%s identifier layout", (_name, layout) => {
  it("matches the fallback layout", () => {
    fc.assert(
      fc.property(timestampArb, randomTenArb, (timestamp, random) => {
        expect(layout.layoutUuidV7(timestamp, random)).toEqual(fallbackLayout.layoutUuidV7(timestamp, random))
      })
    )
  })

  it("reduces timestamps past 48 bits", () => {
    const random = new Uint8Array(10)
    expect(layout.layoutUuidV7(2 ** 48 + 5, random)).toEqual(fallbackLayout.layoutUuidV7(5, random))
  })
})
