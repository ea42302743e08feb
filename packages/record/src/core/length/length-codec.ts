import { CodecError, truncatedData } from "../errors"

/** Largest length written as a single byte. */
export const MAX_INLINE_LENGTH = 0xf9

/** At most this many big-endian bytes may follow a length header. */
export const MAX_LENGTH_BYTES = 6

export type DecodedLength = {
  length: number
  /** Header size: 1 for inline lengths, 1 + k otherwise. */
  bytesRead: number
}

/**
 * Encode a payload length.
 *
 * Lengths up to 0xF9 are a single byte. Longer ones are the byte `0xF9 + k`
 * followed by the `k` big-endian bytes of the length, with `k` minimal.
 *
 * @example
 * ```ts
 * encodeLength(5)   // [0x05]
 * encodeLength(300) // [0xfb, 0x01, 0x2c]
 * ```
 */
export function encodeLength(length: number): Uint8Array {
  if (length <= MAX_INLINE_LENGTH) return Uint8Array.of(length)

  const digits: number[] = []
  for (let rest = length; rest > 0; rest = Math.floor(rest / 256)) {
    digits.unshift(rest % 256)
  }

  if (digits.length > MAX_LENGTH_BYTES) {
    throw new CodecError(
      `length ${length} needs ${digits.length} bytes, at most ${MAX_LENGTH_BYTES} allowed`,
      { code: "length_too_large", context: { length, bytes: digits.length } },
    )
  }

  return Uint8Array.of(MAX_INLINE_LENGTH + digits.length, ...digits)
}

export function decodeLength(bytes: Uint8Array, offset = 0): DecodedLength {
  const head = bytes[offset]
  if (head === undefined) throw truncatedData(offset, 1, 0)

  if (head <= MAX_INLINE_LENGTH) return { length: head, bytesRead: 1 }

  const count = head - MAX_INLINE_LENGTH
  const available = bytes.length - offset - 1
  if (available < count) throw truncatedData(offset + 1, count, available)

  let length = 0
  for (const byte of bytes.subarray(offset + 1, offset + 1 + count)) {
    length = length * 256 + byte
  }

  return { length, bytesRead: 1 + count }
}
