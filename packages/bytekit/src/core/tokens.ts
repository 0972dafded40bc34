export type TokenBase = "binary" | "octal" | "hex" | "decimal" | "base-64"

const lowercase = "abcdefghijklmnopqrstuvwxyz"
const uppercase = "ABCDEFGHIJKLMNOPQRSTUVWXYZ"
const digits = "0123456789"

export const punctuation = "!\"#$%&'()*+,-./:;<=>?@[\\]^_`{|}~"

export const tokenAlphabets: Readonly<Record<TokenBase, string>> = {
  binary: "01",
  octal: "01234567",
  hex: "0123456789abcdef",
  decimal: digits,
  "base-64": `${uppercase}${lowercase}${digits}`
}

// Letters and digits without the look-alikes 0, O, I and l.
export const secureTokenAlphabet = `${lowercase}${uppercase}${digits}`.replaceAll(/[0OIl]/gu, "")

export const randomIdAlphabet = (symbols: boolean): string =>
  symbols ? `${uppercase}${lowercase}${digits}${punctuation}` : `${uppercase}${lowercase}${digits}`

/**
 * Maps random bytes onto alphabet characters by rejection sampling: bytes at or
 * above the largest multiple of the alphabet size are skipped, so every
 * character is equally likely.
 *
 * @pure true
 * @invariant 0 < alphabet.length <= 256
 * @complexity O(n) time / O(n) space
 */
export const sampleAlphabet = (alphabet: string, bytes: Uint8Array): string => {
  const size = alphabet.length
  const limit = 256 - (256 % size)
  let out = ""
  for (const byte of bytes) {
    if (byte < limit) {
      out += alphabet.charAt(byte % size)
    }
  }
  return out
}
