export { StructCodec, type StructCodecDeps, createStructCodec } from "./core/codec/struct-codec"
export {
  CodecError,
  type CodecErrorCode,
  type ConstraintRule,
  invalid,
  SchemaError,
  type SchemaErrorCode,
  ValidationError,
  type ValidationErrorCode,
} from "./core/errors"
export { decodeLength, encodeLength, type DecodedLength } from "./core/length/length-codec"
export { boolean } from "./core/plugins/boolean-type"
export { bytes, type BytesOptions } from "./core/plugins/bytes-type"
export { integer, type IntegerOptions } from "./core/plugins/integer-type"
export { list, type ListOptions } from "./core/plugins/list-type"
export { string, type StringOptions } from "./core/plugins/string-type"
export { struct } from "./core/plugins/struct-type"
export type { FieldDefault, FieldOptions, FieldSpec } from "./core/schema/field-spec"
export { type CrossFieldCheck, Schema } from "./core/schema/schema"
export { SchemaBuilder, type SealedSchemaBuilder, type Shape } from "./core/schema/schema-builder"
export {
  createSchemaRegistry,
  DEFAULT_MAX_DEPTH,
  DEFAULT_MAX_MESSAGE_BYTES,
  defaultRegistry,
  defineSchema,
  type RegisterOptions,
  type RegistrySettings,
  SchemaRegistry,
  type SchemaRegistryOptions,
} from "./core/schema/schema-registry"
export { type CodecSettings, codecSettingsSchema, SETTINGS_ENV_PREFIX } from "./core/settings/codec-settings"
export { type LoadSchemaRegistryOptions, loadSchemaRegistry } from "./core/settings/load-schema-registry"
export { construct, equals, mutate } from "./core/struct/operations"
export { Struct, type StructInput } from "./core/struct/struct"
export { decodeStruct, deserialize, FORMAT_MARKER, serialize } from "./core/wire/wire-codec"
export type { Codec } from "./ports/codec"
export { type FieldKind, FieldKinds } from "./ports/field-kind"
export type { SchemaResolver } from "./ports/schema-resolver"
export type { FieldType, TypePlugin } from "./ports/type-plugin"
