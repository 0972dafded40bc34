import { describe, expect, it } from "@effect/vitest"
import { Either } from "effect"

import { firstNonHexIndex, hexDecode, hexEncode, isHex, nibbleOf } from "../../src/core/hex.js"
import { leftOf, rightOf } from "./property-helpers.js"

describe("hex", () => {
  it("encodes high nibble first in lowercase", () => {
    expect(hexEncode(Uint8Array.of(0x00, 0x0f, 0xab, 0xff))).toBe("000fabff")
    expect(hexEncode(new Uint8Array(0))).toBe("")
  })

  it("decodes both cases", () => {
    expect(rightOf(hexDecode("6162"))).toEqual(Uint8Array.of(0x61, 0x62))
    expect(rightOf(hexDecode("ABcd"))).toEqual(Uint8Array.of(0xab, 0xcd))
    expect(rightOf(hexDecode(""))).toEqual(new Uint8Array(0))
  })

  it("rejects odd length before scanning characters", () => {
    const error = leftOf(hexDecode("zzz"))
    expect(error._tag).toBe("FormatError")
    expect(error.operation).toBe("hexDecode")
    expect(error.message).toBe("odd-length hex string (3 characters)")
  })

  it("reports the first invalid character", () => {
    expect(leftOf(hexDecode("zz")).message).toBe("invalid hex character at index 0")
    expect(leftOf(hexDecode("0g")).message).toBe("invalid hex character at index 1")
    expect(Either.isLeft(hexDecode("0x12"))).toBe(true)
  })

  it("classifies hex text", () => {
    expect(isHex("6162")).toBe(true)
    expect(isHex("abc")).toBe(true)
    expect(isHex("61g2")).toBe(false)
    expect(isHex("")).toBe(false)
    expect(isHex("abé")).toBe(false)
  })

  it("maps nibbles and finds invalid positions", () => {
    expect(nibbleOf("F".charCodeAt(0))).toBe(15)
    expect(nibbleOf("/".charCodeAt(0))).toBe(-1)
    expect(firstNonHexIndex("12x4")).toBe(2)
    expect(firstNonHexIndex("1234")).toBe(-1)
  })
})
