import { Either } from "effect"

import { describeThrown, FormatError } from "./errors.js"

export const hebrewFirst = 0x05_90
export const hebrewLast = 0x05_ff

const isDigitCode = (code: number): boolean => code >= 0x30 && code <= 0x39

export const isAscii = (text: string): boolean => {
  for (const char of text) {
    if ((char.codePointAt(0) ?? 0) >= 0x80) {
      return false
    }
  }
  return true
}

export const isHebrew = (text: string): boolean => {
  for (const char of text) {
    const code = char.codePointAt(0) ?? 0
    if (code >= hebrewFirst && code <= hebrewLast) {
      return true
    }
  }
  return false
}

// CHANGE: keep only the code points below 128
// WHY: portable path for filterAscii, order preserving
// QUOTE(TZ): "returns the subsequence of code points with value < 128, preserving original order"
// REF: user-2026-10-12-bytekit
// SOURCE: n/a
// FORMAT THEOREM: forall t: isAscii(filterAscii(t)) = true
// PURITY: CORE
// INVARIANT: filterAscii(t) = t when isAscii(t)
// COMPLEXITY: O(n)/O(n)
export const filterAscii = (text: string): string => {
  let out = ""
  for (const char of text) {
    if ((char.codePointAt(0) ?? 0) < 0x80) {
      out += char
    }
  }
  return out
}

export const extractDigits = (text: string): string => {
  let out = ""
  for (let index = 0; index < text.length; index++) {
    if (isDigitCode(text.charCodeAt(index))) {
      out += text.charAt(index)
    }
  }
  return out
}

export const isAsciiDigits = (text: string): boolean => {
  for (let index = 0; index < text.length; index++) {
    if (!isDigitCode(text.charCodeAt(index))) {
      return false
    }
  }
  return true
}

const encoder = new TextEncoder()
const strictDecoder = new TextDecoder("utf-8", { fatal: true, ignoreBOM: true })
const lenientDecoder = new TextDecoder("utf-8", { ignoreBOM: true })

export const utf8Encode = (text: string): Uint8Array => encoder.encode(text)

export const utf8Decode = (bytes: Uint8Array): Either.Either<string, FormatError> =>
  Either.try({
    try: () => strictDecoder.decode(bytes),
    catch: (error) => new FormatError({ operation: "utf8Decode", message: describeThrown(error) })
  })

// Malformed sequences become U+FFFD.
export const utf8DecodeLenient = (bytes: Uint8Array): string => lenientDecoder.decode(bytes)
