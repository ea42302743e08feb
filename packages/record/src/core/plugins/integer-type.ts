import { FieldKinds } from "../../ports/field-kind"
import type { FieldType, TypePlugin } from "../../ports/type-plugin"
import { constraintViolation, malformedPayload, typeMismatch } from "../errors"
import { describeValue } from "../struct/describe-value"
import { leafType } from "./leaf-type"

export type IntegerOptions = Readonly<{
  /** Two's complement encoding; unsigned integers reject negatives. Default: true */
  signed?: boolean
  min?: number
  max?: number
}>

class IntegerPlugin implements TypePlugin<number> {
  readonly kind = FieldKinds.Integer
  readonly label = "integer"
  private readonly signed: boolean

  constructor(private readonly options: IntegerOptions) {
    this.signed = options.signed ?? true
  }

  checkType(value: unknown): asserts value is number {
    if (typeof value !== "number" || !Number.isSafeInteger(value)) {
      throw typeMismatch(describeValue(value), this.label)
    }
  }

  checkConstraints(value: unknown): void {
    if (typeof value !== "number" || !Number.isSafeInteger(value)) return

    const { min, max } = this.options
    if (!this.signed && value < 0) {
      throw constraintViolation("negative", "cannot be negative", { value })
    }
    if (min !== undefined && value < min) {
      throw constraintViolation("below_minimum", `must be at least ${min}`, { value, min })
    }
    if (max !== undefined && value > max) {
      throw constraintViolation("above_maximum", `must be at most ${max}`, { value, max })
    }
  }

  serializeValue(value: number): Uint8Array {
    return integerToBytes(value, this.signed)
  }

  deserializeValue(payload: Uint8Array): number {
    if (payload.length === 0) throw malformedPayload("is not a valid integer payload")
    return bytesToInteger(payload, this.signed)
  }
}

export function integer(options: IntegerOptions = {}): FieldType<number> {
  return leafType(new IntegerPlugin(options))
}

/**
 * Minimal big-endian encoding. Signed values use two's complement, so a
 * positive value whose bit length is a multiple of 8 gains a leading 0x00.
 *
 * @example
 * ```ts
 * integerToBytes(128, true)  // [0x00, 0x80]
 * integerToBytes(-129, true) // [0xff, 0x7f]
 * integerToBytes(255, false) // [0xff]
 * ```
 */
export function integerToBytes(value: number, signed: boolean): Uint8Array {
  const n = BigInt(value)

  let size = 1
  while (!fits(n, size, signed)) size++

  let rest = n < 0n ? (1n << BigInt(size * 8)) + n : n
  const out = new Uint8Array(size)
  for (let index = size - 1; index >= 0; index--) {
    out[index] = Number(rest & 0xffn)
    rest >>= 8n
  }
  return out
}

export function bytesToInteger(payload: Uint8Array, signed: boolean): number {
  let n = 0n
  for (const byte of payload) n = (n << 8n) | BigInt(byte)

  const first = payload[0] ?? 0
  if (signed && first >= 0x80) n -= 1n << BigInt(payload.length * 8)

  return Number(n)
}

function fits(n: bigint, size: number, signed: boolean): boolean {
  const bits = BigInt(size * 8)
  if (!signed) return n < 1n << bits

  const half = 1n << (bits - 1n)
  return n >= -half && n < half
}
