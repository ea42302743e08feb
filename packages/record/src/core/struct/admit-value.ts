import { type FieldSpec, resolveDefault } from "../schema/field-spec"
import { missingValue, prefixPath } from "../errors"

/**
 * Run one value through its field spec: default, optionality,
 * constraints, type, normalization. Errors are prefixed with the field name.
 */
export function admitValue(spec: FieldSpec, provided: unknown): unknown {
  try {
    let value = provided ?? null
    if (value === null && spec.defaultValue !== undefined) {
      value = resolveDefault(spec.defaultValue) ?? null
    }

    if (value === null) {
      if (!spec.optional) throw missingValue()
      return null
    }

    spec.plugin.checkConstraints(value)
    spec.plugin.checkType(value)
    return spec.plugin.normalize ? spec.plugin.normalize(value) : value
  } catch (err) {
    throw prefixPath(err, spec.name)
  }
}
