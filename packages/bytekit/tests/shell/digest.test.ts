import { describe, expect, it } from "@effect/vitest"
import { Effect } from "effect"

import { hexEncode } from "../../src/core/hex.js"
import { nodeDigest } from "../../src/shell/digest.js"
import { utf8 } from "../core/property-helpers.js"

describe("digest", () => {
  it.effect("computes MD5", () =>
    Effect.gen(function*(_) {
      const hello = yield* _(nodeDigest.md5(utf8("hello")))
      const empty = yield* _(nodeDigest.md5(new Uint8Array(0)))
      expect(hexEncode(hello)).toBe("5d41402abc4b2a76b9719d911017c592")
      expect(hexEncode(empty)).toBe("d41d8cd98f00b204e9800998ecf8427e")
    }))
})
