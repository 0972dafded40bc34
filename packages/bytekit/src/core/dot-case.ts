import { Either, pipe } from "effect"

import { ValueError } from "./errors.js"
import type { KeyFn, NestedRecord, NestedValue } from "./structure.js"
import { buildRecord, changeKeysCase, classify, sortKeysRecursively } from "./structure.js"

type FlatEntry = readonly [string, NestedValue]

const isRecordValue = (value: NestedValue): value is NestedRecord =>
  Either.match(classify(value), {
    onLeft: () => false,
    onRight: (classified) => classified.kind === "record"
  })

const flattenArray = (items: ReadonlyArray<NestedValue>, path: string): ReadonlyArray<FlatEntry> =>
  items.flatMap((item, index): ReadonlyArray<FlatEntry> =>
    isRecordValue(item) ? flattenRecord(item, `${path}.[${index}]`) : [[`${path}[${index}]`, item]]
  )

/**
 * Flattens nested records into dot paths.
 *
 * Scalars inside arrays are addressed as `key[i]`; records inside arrays are
 * flattened under `key.[i]`.
 *
 * @pure true
 * @complexity O(n) time / O(n) space
 */
export const flattenRecord = (record: NestedRecord, prefix = ""): ReadonlyArray<FlatEntry> =>
  Object.entries(record).flatMap(([key, value]): ReadonlyArray<FlatEntry> => {
    const path = prefix ? `${prefix}.${key}` : key
    if (isRecordValue(value)) {
      return flattenRecord(value, path)
    }
    return Array.isArray(value) ? flattenArray(value, path) : [[path, value]]
  })

const flattenValue = (value: NestedValue): Either.Either<NestedValue, ValueError> =>
  Either.flatMap(classify(value), (classified): Either.Either<NestedValue, ValueError> => {
    if (classified.kind === "record") {
      return Either.right(buildRecord(flattenRecord(buildRecord(classified.entries))))
    }
    if (classified.kind === "list" || classified.kind === "set") {
      const items: Array<NestedValue> = []
      for (const item of classified.items) {
        const flattened = flattenValue(item)
        if (Either.isLeft(flattened)) {
          return flattened
        }
        items.push(flattened.right)
      }
      return Either.right(classified.kind === "set" ? new Set(items) : items)
    }
    return Either.left(new ValueError({ message: `toDotCase expects a record or a sequence, got ${classified.kind}` }))
  })

// CHANGE: rewrite keys, flatten nested records to dot paths and sort the result
// WHY: produce stable flat keys for configuration-style lookups
// QUOTE(TZ): n/a
// REF: user-2026-10-12-bytekit
// SOURCE: n/a
// FORMAT THEOREM: forall r: keys(toDotCase(r)) are sorted ascending
// PURITY: CORE
// INVARIANT: flattened values are never containers of records
// COMPLEXITY: O(n log n)/O(n)
export const toDotCase = (value: NestedValue, keyFn: KeyFn): Either.Either<NestedValue, ValueError> =>
  pipe(
    changeKeysCase(value, keyFn, true),
    Either.flatMap(flattenValue),
    Either.map(sortKeysRecursively)
  )
