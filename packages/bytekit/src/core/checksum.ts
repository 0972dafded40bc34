import { Option } from "effect"

import { NationalIdDigits } from "./brand.js"
import { isAsciiDigits } from "./text.js"

export const nationalIdWidth = 9

/**
 * Validates the shape of a national ID and pads it to the fixed width.
 *
 * @returns `None` for the empty string, non-digit input, or input longer than
 * the width; the checksum is never evaluated on those.
 *
 * @pure true
 * @complexity O(n) time / O(n) space
 */
export const normalizeNationalId = (text: string): Option.Option<NationalIdDigits> => {
  // The digit scan is vacuously true for "", so the empty ID is rejected here.
  if (text.length === 0 || text.length > nationalIdWidth || !isAsciiDigits(text)) {
    return Option.none()
  }
  return Option.some(NationalIdDigits(text.padStart(nationalIdWidth, "0")))
}

/**
 * Weighted digit sum: odd positions (0-indexed) count double, and a doubled
 * digit above 9 contributes the sum of its two decimal digits.
 *
 * @pure true
 * @invariant digits.length === nationalIdWidth
 * @complexity O(1) time / O(1) space
 */
export const weightedDigitSum = (digits: NationalIdDigits): number => {
  let total = 0
  for (let index = 0; index < digits.length; index++) {
    const digit = digits.charCodeAt(index) - 0x30
    const step = digit * (1 + (index % 2))
    total += step > 9 ? step - 9 : step
  }
  return total
}

// CHANGE: validate a national ID with the positional-weighted checksum
// WHY: validation reports false instead of raising on malformed input
// QUOTE(TZ): "Valid iff total mod 10 == 0"
// REF: user-2026-10-12-bytekit
// SOURCE: n/a
// FORMAT THEOREM: forall t: isValidNationalId(t) ⇒ 0 < length(t) <= 9 ∧ digits(t)
// PURITY: CORE
// INVARIANT: isValidNationalId("") = false
// COMPLEXITY: O(n)/O(1)
export const isValidNationalId = (text: string): boolean =>
  Option.match(normalizeNationalId(text), {
    onNone: () => false,
    onSome: (digits) => weightedDigitSum(digits) % 10 === 0
  })
