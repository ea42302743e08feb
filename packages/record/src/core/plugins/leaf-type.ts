import type { FieldType, TypePlugin } from "../../ports/type-plugin"
import { malformedPayload } from "../errors"
import { concatBytes } from "../wire/chunks"

/** Leading byte of Bytes, String and List payloads. */
export const PRESENCE_BYTE = 0x01

/** Field type for plugins that never look up other schemas. */
export function leafType<V>(plugin: TypePlugin<V>): FieldType<V> {
  return { kind: plugin.kind, bind: () => plugin }
}

export function withPresence(body: Uint8Array): Uint8Array {
  return concatBytes([Uint8Array.of(PRESENCE_BYTE), body])
}

export function withoutPresence(payload: Uint8Array, label: string): Uint8Array {
  if (payload[0] !== PRESENCE_BYTE) {
    throw malformedPayload(`is not a valid ${label} payload: missing presence byte`)
  }
  return payload.subarray(1)
}
