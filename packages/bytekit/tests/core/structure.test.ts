import { describe, expect, it } from "@effect/vitest"

import type { NestedValue } from "../../src/core/structure.js"
import {
  changeKeysCase,
  isStructuralContainer,
  isTruthy,
  mergeReservedPrefix,
  sortKeysRecursively
} from "../../src/core/structure.js"
import { leftOf, rightOf, utf8 } from "./property-helpers.js"

const upper = (key: string): string => key.toUpperCase()
const lower = (key: string): string => key.toLowerCase()
const identity = (key: string): string => key

class BrokenIterable implements Iterable<NestedValue> {
  [Symbol.iterator](): Iterator<NestedValue> {
    throw new Error("boom")
  }
}

function* records(): Generator<NestedValue> {
  yield { a: 1 }
  yield "b"
}

const nestLists = (levels: number): NestedValue => {
  let value: NestedValue = "leaf"
  for (let level = 0; level < levels; level++) {
    value = [value]
  }
  return value
}

describe("isStructuralContainer", () => {
  it("accepts mappings and sequences", () => {
    expect(isStructuralContainer({})).toBe(true)
    expect(isStructuralContainer([])).toBe(true)
    expect(isStructuralContainer(new Set())).toBe(true)
    expect(isStructuralContainer(new Map())).toBe(true)
    expect(isStructuralContainer(records())).toBe(true)
  })

  it("rejects text, bytes and scalars", () => {
    expect(isStructuralContainer("abc")).toBe(false)
    expect(isStructuralContainer(utf8("abc"))).toBe(false)
    expect(isStructuralContainer(1)).toBe(false)
    expect(isStructuralContainer(null)).toBe(false)
    expect(isStructuralContainer(new Date(0))).toBe(false)
  })

  it("rejects objects whose iterator throws", () => {
    expect(isStructuralContainer(new BrokenIterable())).toBe(false)
  })
})

describe("sortKeysRecursively", () => {
  it("sorts keys at every level", () => {
    const sorted = sortKeysRecursively({ b: 1, a: { d: 2, c: 3 } })
    expect(sorted).toEqual({ a: { c: 3, d: 2 }, b: 1 })
    expect(Object.keys(sorted ?? {})).toEqual(["a", "b"])
  })

  it("compares by code unit so uppercase sorts first", () => {
    expect(Object.keys(sortKeysRecursively({ b: 1, B: 2, a: 3 }) ?? {})).toEqual(["B", "a", "b"])
  })

  it("lists integer-like record keys first but sorts map keys by code unit", () => {
    expect(Object.keys(sortKeysRecursively({ b: 1, "10": 2, "9": 3 }) ?? {})).toEqual(["9", "10", "b"])
    const map = sortKeysRecursively(new Map<string, NestedValue>([["b", 1], ["10", 2], ["9", 3]]))
    expect(map instanceof Map ? [...map.keys()] : []).toEqual(["10", "9", "b"])
  })

  it("keeps sequence order and sorts records inside sequences", () => {
    const sorted = sortKeysRecursively({ z: [{ y: 1, x: 2 }, 3] })
    expect(sorted).toEqual({ z: [{ x: 2, y: 1 }, 3] })
  })

  it("preserves map and set kinds", () => {
    const map = sortKeysRecursively(new Map([["b", 1], ["a", 2]]))
    expect(map).toBeInstanceOf(Map)
    expect(map instanceof Map ? [...map.keys()] : []).toEqual(["a", "b"])
    expect(sortKeysRecursively(new Set([{ b: 1, a: 2 }]))).toEqual(new Set([{ a: 2, b: 1 }]))
  })

  it("passes scalars through", () => {
    expect(sortKeysRecursively("text")).toBe("text")
    expect(sortKeysRecursively(null)).toBeNull()
  })
})

describe("mergeReservedPrefix", () => {
  it("fills falsy twins and keeps the prefixed keys", () => {
    expect(mergeReservedPrefix([["_a", 1], ["a", 0]])).toEqual([["_a", 1], ["a", 1]])
    expect(mergeReservedPrefix([["_a", 1], ["a", 2]])).toEqual([["_a", 1], ["a", 2]])
    expect(mergeReservedPrefix([["__a", "x"], ["a", ""]])).toEqual([["__a", "x"], ["a", "x"]])
    expect(mergeReservedPrefix([["_b", 1]])).toEqual([["_b", 1]])
  })

  it("treats empty containers as falsy", () => {
    expect(isTruthy([])).toBe(false)
    expect(isTruthy(new Map())).toBe(false)
    expect(isTruthy({})).toBe(false)
    expect(isTruthy(Number.NaN)).toBe(false)
    expect(isTruthy(utf8(""))).toBe(false)
    expect(isTruthy(utf8("a"))).toBe(true)
    expect(mergeReservedPrefix([["_a", utf8("x")], ["a", utf8("")]])).toEqual([["_a", utf8("x")], ["a", utf8("x")]])
    expect(mergeReservedPrefix([["_a", [1]], ["a", []]])).toEqual([["_a", [1]], ["a", [1]]])
  })
})

describe("changeKeysCase", () => {
  it("rewrites keys deeply", () => {
    expect(rightOf(changeKeysCase({ a: 1, b: { c: 2 } }, upper))).toEqual({ A: 1, B: { C: 2 } })
  })

  it("leaves nested mapping values alone when not deep", () => {
    expect(rightOf(changeKeysCase({ a: 1, b: { c: 2 } }, upper, false))).toEqual({ A: 1, B: { c: 2 } })
  })

  it("recurses into sequence elements regardless of deep", () => {
    expect(rightOf(changeKeysCase([{ a: { b: 1 } }], upper, false))).toEqual([{ A: { b: 1 } }])
  })

  it("applies keyFn to text and bytes scalars", () => {
    expect(rightOf(changeKeysCase("abc", upper))).toBe("ABC")
    expect(rightOf(changeKeysCase(utf8("ab"), upper))).toBe("AB")
  })

  it("passes opaque scalars through", () => {
    expect(rightOf(changeKeysCase(42, upper))).toBe(42)
    expect(rightOf(changeKeysCase(null, upper))).toBeNull()
  })

  it("merges reserved-prefix keys without mutating the input", () => {
    const input = { _a: 1, a: 0 }
    expect(rightOf(changeKeysCase(input, identity))).toEqual({ _a: 1, a: 1 })
    expect(input).toEqual({ _a: 1, a: 0 })
  })

  it("resolves rewritten collisions last-write-wins", () => {
    expect(rightOf(changeKeysCase({ A: 1, a: 2 }, lower))).toEqual({ a: 2 })
  })

  it("keeps a set a set", () => {
    const changed = rightOf(changeKeysCase(new Set([{ a: 1 }]), upper))
    expect(changed).toBeInstanceOf(Set)
    expect(changed).toEqual(new Set([{ A: 1 }]))
  })

  it("rewrites map keys as text", () => {
    expect(rightOf(changeKeysCase(new Map([["a", 1]]), upper))).toEqual(new Map([["A", 1]]))
    expect(rightOf(changeKeysCase(new Map([[1, "x"]]), identity))).toEqual(new Map([["1", "x"]]))
  })

  it("rebuilds foreign iterables as arrays", () => {
    expect(rightOf(changeKeysCase(records(), upper))).toEqual([{ A: 1 }, "b"])
  })

  it("stores __proto__ as a plain key", () => {
    const changed = rightOf(changeKeysCase({ __PROTO__: 1 }, lower))
    expect(Object.keys(changed ?? {})).toEqual(["__proto__"])
    expect(Object.getPrototypeOf(changed)).toBe(Object.prototype)
  })

  it("fails on a top-level value whose iteration throws", () => {
    const error = leftOf(changeKeysCase(new BrokenIterable(), upper))
    expect(error._tag).toBe("ValueError")
    expect(error.message).toBe("value is not iterable: boom")
  })

  it("caps recursion depth", () => {
    expect(leftOf(changeKeysCase(nestLists(1100), upper)).message).toBe("nesting deeper than 1000 levels")
    expect(rightOf(changeKeysCase(nestLists(500), upper))).toEqual(nestLists(500))
  })
})
