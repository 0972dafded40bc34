import { describe, expect, it } from "@effect/vitest"

import { bindCodec } from "../../src/app/codec.js"
import { fallbackCodec } from "../../src/core/fallback-codec.js"
import { nativeCodec } from "../../src/shell/native-codec.js"
import { leftOf, rightOf } from "../core/property-helpers.js"

describe.each([
  ["fallback", bindCodec(fallbackCodec)],
  ["native", bindCodec(nativeCodec)]
])("bound %s codec", (_name, codec) => {
  it("converts text through UTF-8", () => {
    expect(codec.textToHex("h\u00e9")).toBe("68c3a9")
    expect(rightOf(codec.hexToText("68c3a9"))).toBe("h\u00e9")
    expect(codec.textToBase64("h\u00e9llo")).toBe("aMOpbGxv")
    expect(rightOf(codec.base64ToText("aMOpbGxv"))).toBe("h\u00e9llo")
  })

  it("reports bytes that are not UTF-8", () => {
    const error = leftOf(codec.hexToText("ff"))
    expect(error._tag).toBe("FormatError")
  })

  it("reports malformed input from the decoder", () => {
    expect(leftOf(codec.hexToText("abc")).operation).toBe("hexDecode")
    expect(leftOf(codec.base64ToText("abc")).operation).toBe("base64Decode")
  })

  it("keeps the text validators", () => {
    expect(codec.isBase64("YWI=")).toBe(true)
    expect(codec.isBase64("YWI")).toBe(false)
    expect(codec.isHex("6162")).toBe(true)
  })
})
