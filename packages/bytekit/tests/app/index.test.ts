import { describe, expect, it } from "@effect/vitest"
import { Effect } from "effect"

import {
  BytekitLive,
  defaultSelection,
  Dispatch,
  generate,
  hexDecode,
  parseTimestamp,
  stableIdentifier,
  textToHex
} from "../../src/index.js"
import { leftOf, rightOf } from "../core/property-helpers.js"

describe("package entry", () => {
  it("resolves a frozen selection at import", () => {
    expect(Object.isFrozen(defaultSelection)).toBe(true)
    expect(["native", "fallback"]).toContain(defaultSelection.paths.codec)
  })

  it("exposes the selected codec as plain functions", () => {
    expect(textToHex("ab")).toBe("6162")
    expect(rightOf(hexDecode("6162"))).toEqual(Uint8Array.of(0x61, 0x62))
    expect(leftOf(hexDecode("zz"))._tag).toBe("FormatError")
  })

  it.effect("runs the effectful operations on the live layer", () =>
    Effect.gen(function*(_) {
      const id = yield* _(Effect.provide(generate, BytekitLive))
      const stable = yield* _(Effect.provide(stableIdentifier(["hello"]), BytekitLive))
      const selection = yield* _(Effect.provide(Dispatch, BytekitLive))
      expect(selection).toBe(defaultSelection)
      expect(id).toMatch(/^[0-9a-f]{8}-[0-9a-f]{4}-7[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/u)
      expect(rightOf(parseTimestamp(id))._tag).toBe("Some")
      expect(stable).toBe("5D41402A-BC4B-2A76-B971-9D911017C592")
    }))
})
