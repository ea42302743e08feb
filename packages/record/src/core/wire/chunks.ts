import { CodecError, truncatedData } from "../errors"
import { decodeLength, encodeLength } from "../length/length-codec"

/** A chunk payload, or null for the zero-length absence marker. */
export type Chunk = Uint8Array | null

const ABSENT = Uint8Array.of(0x00)

/**
 * Write `head` followed by one framed chunk per entry.
 * Used for whole messages (head = format marker) and list payloads (head = presence byte).
 */
export function encodeChunks(head: number, chunks: readonly Chunk[]): Uint8Array {
  const parts: Uint8Array[] = [Uint8Array.of(head)]

  chunks.forEach((chunk, index) => {
    if (chunk === null) {
      parts.push(ABSENT)
      return
    }
    if (chunk.length === 0) {
      throw new CodecError("cannot frame an empty payload", {
        code: "malformed_payload",
        context: { index },
      })
    }
    parts.push(encodeLength(chunk.length), chunk)
  })

  return concatBytes(parts)
}

/**
 * Read framed chunks from `offset` to the end of `bytes`.
 * Returned payloads are views into `bytes`.
 */
export function decodeChunks(bytes: Uint8Array, offset: number): Chunk[] {
  const chunks: Chunk[] = []

  let cursor = offset
  while (cursor < bytes.length) {
    const { length, bytesRead } = decodeLength(bytes, cursor)
    const start = cursor + bytesRead
    const end = start + length

    if (end > bytes.length) throw truncatedData(start, length, bytes.length - start)

    chunks.push(length === 0 ? null : bytes.subarray(start, end))
    cursor = end
  }

  return chunks
}

export function concatBytes(parts: readonly Uint8Array[]): Uint8Array {
  const out = new Uint8Array(parts.reduce((sum, part) => sum + part.length, 0))

  let offset = 0
  for (const part of parts) {
    out.set(part, offset)
    offset += part.length
  }

  return out
}
