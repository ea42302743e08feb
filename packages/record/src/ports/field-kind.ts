/**
 * Closed set of field kinds. Plugins are told apart by this tag,
 * never by constructor or class names.
 */
export const FieldKinds = {
  Boolean: "boolean",
  Integer: "integer",
  Bytes: "bytes",
  String: "string",
  List: "list",
  Struct: "struct",
} as const

export type FieldKind = (typeof FieldKinds)[keyof typeof FieldKinds]
