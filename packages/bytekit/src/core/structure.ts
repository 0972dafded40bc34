import { Either, Match, pipe } from "effect"

import { describeThrown, ValueError } from "./errors.js"
import { utf8DecodeLenient } from "./text.js"

export type MapKey = string | number | bigint | boolean

export type Scalar = string | number | boolean | bigint | symbol | null | undefined | Uint8Array | Date

export type NestedRecord = { readonly [key: string]: NestedValue }

export type NestedValue =
  | Scalar
  | NestedRecord
  | ReadonlyArray<NestedValue>
  | ReadonlySet<NestedValue>
  | ReadonlyMap<MapKey, NestedValue>
  | Iterable<NestedValue>

export type KeyFn = (key: string) => string

type Entry<K> = readonly [K, NestedValue]

// CHANGE: model nested values as a closed tagged variant decided once per call
// WHY: replace ad-hoc runtime type tests with one exhaustive match per recursion step
// QUOTE(TZ): "a closed tagged-variant/sum type with one arm per container kind plus a scalar arm"
// REF: user-2026-10-12-bytekit
// SOURCE: n/a
// FORMAT THEOREM: forall v: classify(v) has exactly one kind
// PURITY: CORE
// INVARIANT: text and bytes are never containers
// COMPLEXITY: O(1) for built-in kinds, O(n) for foreign iterables
export type Classified =
  | { readonly kind: "text"; readonly value: string }
  | { readonly kind: "bytes"; readonly value: Uint8Array }
  | { readonly kind: "record"; readonly entries: ReadonlyArray<Entry<string>> }
  | { readonly kind: "map"; readonly entries: ReadonlyArray<Entry<MapKey>> }
  | { readonly kind: "list"; readonly items: ReadonlyArray<NestedValue> }
  | { readonly kind: "set"; readonly items: ReadonlyArray<NestedValue> }
  | { readonly kind: "opaque"; readonly value: NestedValue }

export const maxDepth = 1000

const reservedPrefix = "_"

const isPlainRecord = (value: object): value is NestedRecord => {
  const proto: object | null = Object.getPrototypeOf(value)
  return proto === Object.prototype || proto === null
}

const hasIteratorMethod = (value: object): value is Iterable<NestedValue> =>
  typeof Reflect.get(value, Symbol.iterator) === "function"

const isMap = (value: object): value is ReadonlyMap<MapKey, NestedValue> => value instanceof Map

const isSet = (value: object): value is ReadonlySet<NestedValue> => value instanceof Set

const asBytes = (view: ArrayBufferView): Uint8Array =>
  view instanceof Uint8Array ? view : new Uint8Array(view.buffer, view.byteOffset, view.byteLength)

// Obtaining an iterator does not advance it, so one-shot iterables stay intact.
const probeIterator = (value: Iterable<NestedValue>): boolean =>
  Either.isRight(
    Either.try(() => {
      const iterator = value[Symbol.iterator]()
      if (typeof iterator.next !== "function") {
        throw new TypeError("iterator has no next()")
      }
      return iterator
    })
  )

const materialize = (value: Iterable<NestedValue>): Either.Either<ReadonlyArray<NestedValue>, ValueError> =>
  Either.try({
    try: () => Array.from(value),
    catch: (error) => new ValueError({ message: `value is not iterable: ${describeThrown(error)}` })
  })

const known = (classified: Classified): Either.Either<Classified, ValueError> => Either.right(classified)

/**
 * Classifies a value into its variant, materializing foreign iterables.
 *
 * @returns `Left(ValueError)` only when a value exposes `Symbol.iterator` but
 * iterating it throws.
 */
export const classify = (value: NestedValue): Either.Either<Classified, ValueError> => {
  if (typeof value === "string") {
    return known({ kind: "text", value })
  }
  if (typeof value !== "object" || value === null) {
    return known({ kind: "opaque", value })
  }
  if (ArrayBuffer.isView(value)) {
    return known({ kind: "bytes", value: asBytes(value) })
  }
  if (Array.isArray(value)) {
    return known({ kind: "list", items: [...value] })
  }
  if (isSet(value)) {
    return known({ kind: "set", items: [...value] })
  }
  if (isMap(value)) {
    return known({ kind: "map", entries: [...value.entries()] })
  }
  if (value instanceof Date) {
    return known({ kind: "opaque", value })
  }
  if (isPlainRecord(value)) {
    return known({ kind: "record", entries: Object.entries(value) })
  }
  if (hasIteratorMethod(value)) {
    return Either.map(materialize(value), (items): Classified => ({ kind: "list", items }))
  }
  return known({ kind: "opaque", value })
}

const isContainerKind = (classified: Classified): boolean =>
  classified.kind === "record" || classified.kind === "map" || classified.kind === "list" ||
  classified.kind === "set"

// CHANGE: classify a value as a structural container without consuming it
// WHY: recursion only descends into mappings and sequences, never into text or bytes
// QUOTE(TZ): "any other object is tested by attempting iteration and excluded on failure"
// REF: user-2026-10-12-bytekit
// SOURCE: n/a
// FORMAT THEOREM: forall s in String: isStructuralContainer(s) = false
// PURITY: CORE
// INVARIANT: the value is not iterated
// COMPLEXITY: O(1)/O(1)
export const isStructuralContainer = (value: NestedValue): boolean => {
  if (typeof value !== "object" || value === null || ArrayBuffer.isView(value) || value instanceof Date) {
    return false
  }
  if (Array.isArray(value) || isSet(value) || isMap(value) || isPlainRecord(value)) {
    return true
  }
  return hasIteratorMethod(value) && probeIterator(value)
}

const compareText = (left: string, right: string): number => {
  if (left < right) {
    return -1
  }
  return left > right ? 1 : 0
}

const defineKey = (target: Record<string, NestedValue>, key: string, value: NestedValue): void => {
  Object.defineProperty(target, key, { value, enumerable: true, writable: true, configurable: true })
}

export const buildRecord = (entries: ReadonlyArray<Entry<string>>): NestedRecord => {
  const out: Record<string, NestedValue> = {}
  for (const [key, value] of entries) {
    defineKey(out, key, value)
  }
  return out
}

// A foreign iterable that cannot be iterated is left as it is.
const classifyNested = (value: NestedValue): Classified =>
  Either.getOrElse(classify(value), (): Classified => ({ kind: "opaque", value }))

const sortClassified = (classified: Classified, original: NestedValue): NestedValue =>
  Match.value(classified).pipe(
    Match.when({ kind: "record" }, ({ entries }) =>
      buildRecord(
        [...entries]
          .sort(([left], [right]) => compareText(left, right))
          .map(([key, value]): Entry<string> => [key, sortKeysRecursively(value)])
      )),
    Match.when({ kind: "map" }, ({ entries }) =>
      new Map(
        [...entries]
          .sort(([left], [right]) => compareText(String(left), String(right)))
          .map(([key, value]): Entry<MapKey> => [key, sortKeysRecursively(value)])
      )),
    Match.when({ kind: "list" }, ({ items }) => items.map((item) => sortKeysRecursively(item))),
    Match.when({ kind: "set" }, ({ items }) => new Set(items.map((item) => sortKeysRecursively(item)))),
    Match.orElse(() => original)
  )

// CHANGE: rebuild mappings with ascending keys at every level
// WHY: give nested data one canonical key order while keeping sequence order as data
// QUOTE(TZ): "sequences (non-mapping element lists) are recursed element-wise but their element order is preserved"
// REF: user-2026-10-12-bytekit
// SOURCE: n/a
// FORMAT THEOREM: forall v: sortKeysRecursively(sortKeysRecursively(v)) = sortKeysRecursively(v)
// PURITY: CORE
// INVARIANT: container kinds are preserved; scalars pass through by reference
// INVARIANT: plain records still enumerate integer-like keys first in ascending numeric order,
//   so {"b": 1, "10": 2, "9": 3} lists 9, 10, b; Map keys follow the comparator exactly
// COMPLEXITY: O(n log n)/O(n)
export const sortKeysRecursively = (value: NestedValue): NestedValue => sortClassified(classifyNested(value), value)

/**
 * Truthiness used by the reserved-prefix merge: empty containers and empty
 * byte buffers count as false alongside `false`, `0`, `NaN`, `""`, `null` and `undefined`.
 */
export const isTruthy = (value: NestedValue): boolean => {
  if (!value) {
    return false
  }
  if (ArrayBuffer.isView(value)) {
    return value.byteLength > 0
  }
  if (typeof value !== "object" || value instanceof Date) {
    return true
  }
  if (Array.isArray(value)) {
    return value.length > 0
  }
  if (isSet(value) || isMap(value)) {
    return value.size > 0
  }
  return isPlainRecord(value) ? Object.keys(value).length > 0 : true
}

const stripReservedPrefix = (key: string): string => {
  let start = 0
  while (key.startsWith(reservedPrefix, start)) {
    start += reservedPrefix.length
  }
  return key.slice(start)
}

// CHANGE: merge reserved-prefix keys into their unprefixed twins over a snapshot
// WHY: "_a" carries the value for "a" when "a" is falsy, without mutating the caller's mapping
// QUOTE(TZ): "set the candidate's value to the logical-OR (first truthy wins) of the existing value and the prefixed value"
// REF: user-2026-10-12-bytekit
// SOURCE: n/a
// FORMAT THEOREM: forall m: keys(mergeReservedPrefix(m)) = keys(m)
// PURITY: CORE
// INVARIANT: prefixed keys are kept; only candidate values change
// COMPLEXITY: O(n)/O(n)
export const mergeReservedPrefix = <K extends MapKey>(
  entries: ReadonlyArray<Entry<K>>
): ReadonlyArray<Entry<K>> => {
  const positions = new Map<string, number>()
  entries.forEach(([key], index) => {
    positions.set(String(key), index)
  })
  const values = entries.map(([, value]) => value)
  entries.forEach(([key], index) => {
    const text = String(key)
    if (!text.startsWith(reservedPrefix)) {
      return
    }
    const target = positions.get(stripReservedPrefix(text))
    if (target === undefined || target === index) {
      return
    }
    const current = values[target]
    values[target] = isTruthy(current) ? current : values[index]
  })
  return entries.map(([key], index): Entry<K> => [key, values[index]])
}

type CaseContext = {
  readonly keyFn: KeyFn
  readonly deep: boolean
  readonly depth: number
}

const depthError = (): ValueError => new ValueError({ message: `nesting deeper than ${maxDepth} levels` })

const traverseAll = (
  values: ReadonlyArray<NestedValue>,
  step: (value: NestedValue) => Either.Either<NestedValue, ValueError>
): Either.Either<ReadonlyArray<NestedValue>, ValueError> => {
  const out: Array<NestedValue> = []
  for (const value of values) {
    const next = step(value)
    if (Either.isLeft(next)) {
      return Either.left(next.left)
    }
    out.push(next.right)
  }
  return Either.right(out)
}

const changeChild = (value: NestedValue, context: CaseContext): Either.Either<NestedValue, ValueError> => {
  const classified = classifyNested(value)
  return isContainerKind(classified) ? changeClassified(classified, context) : Either.right(value)
}

const changeMappingValue = (value: NestedValue, context: CaseContext): Either.Either<NestedValue, ValueError> =>
  context.deep ? changeChild(value, context) : Either.right(value)

const changeEntries = <K extends MapKey>(
  entries: ReadonlyArray<Entry<K>>,
  context: CaseContext
): Either.Either<ReadonlyArray<Entry<string>>, ValueError> => {
  const merged = mergeReservedPrefix(entries)
  return Either.map(
    traverseAll(merged.map(([, value]) => value), (value) => changeMappingValue(value, context)),
    (values) => merged.map(([key], index): Entry<string> => [context.keyFn(String(key)), values[index]])
  )
}

// Plain narrowing, one frame group per nesting level: maxDepth levels must fit in the default stack.
const changeClassified = (classified: Classified, context: CaseContext): Either.Either<NestedValue, ValueError> => {
  if (context.depth > maxDepth) {
    return Either.left(depthError())
  }
  const child: CaseContext = { ...context, depth: context.depth + 1 }
  if (classified.kind === "text") {
    return Either.right(context.keyFn(classified.value))
  }
  if (classified.kind === "bytes") {
    return Either.right(context.keyFn(utf8DecodeLenient(classified.value)))
  }
  if (classified.kind === "record") {
    return Either.map(changeEntries(classified.entries, child), buildRecord)
  }
  if (classified.kind === "map") {
    return Either.map(changeEntries(classified.entries, child), (changed): NestedValue => new Map(changed))
  }
  if (classified.kind === "opaque") {
    return Either.right(classified.value)
  }
  const items = traverseAll(classified.items, (item) => changeChild(item, child))
  return classified.kind === "set" ? Either.map(items, (changed): NestedValue => new Set(changed)) : items
}

// CHANGE: rewrite mapping keys through a caller-supplied function, preserving container shapes
// WHY: key-case conversion layers only supply keyFn; the traversal and merge rules live here
// QUOTE(TZ): "reconstruct the same container kind (list stays list, tuple-like stays tuple-like, set-like stays set-like)"
// REF: user-2026-10-12-bytekit
// SOURCE: n/a
// FORMAT THEOREM: forall s in Set: changeKeysCase(s, f, d) = Right(s') -> s' in Set
// PURITY: CORE
// INVARIANT: the input value is never mutated; inputs must be acyclic
// COMPLEXITY: O(n)/O(n)
export const changeKeysCase = (
  value: NestedValue,
  keyFn: KeyFn,
  deep = true
): Either.Either<NestedValue, ValueError> =>
  pipe(
    classify(value),
    Either.flatMap((classified) => changeClassified(classified, { keyFn, deep, depth: 0 }))
  )
