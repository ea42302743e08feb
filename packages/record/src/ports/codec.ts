/**
 * Codec defines a bidirectional transformation between a typed value `T`
 * and a byte representation.
 *
 * @remarks
 * This is the surface transport and storage collaborators consume: socket
 * framing, message queues and key-value stores treat the output as opaque
 * bytes and agree out-of-band on which schema applies.
 *
 * Codecs should be pure, deterministic transforms.
 *
 * @example
 * ```ts
 * const codec = new StructCodec({ schema: Person })
 * const bytes = codec.encode(Person.create({ age: 25, name: "John" }))
 * const again = codec.decode(bytes)
 * ```
 */
export interface Codec<T> {
  /** Encode a value into its byte representation. */
  encode(value: T): Uint8Array

  /** Decode a previously encoded byte representation back into a value. */
  decode(bytes: Uint8Array): T
}
