import { BaseError } from "@recordwire/errors"
import { thrown } from "../../../tests/utils/thrown"
import { createSchemaRegistry } from "../../schema/schema-registry"
import { integer } from "../integer-type"
import { list } from "../list-type"
import { string } from "../string-type"

describe("list()", () => {
  const registry = createSchemaRegistry()

  it("frames each element as a chunk after the presence byte", () => {
    const plugin = list(integer()).bind(registry)

    expect([...plugin.serializeValue([1, 2, 3])]).toEqual([0x01, 0x01, 0x01, 0x01, 0x02, 0x01, 0x03])
    expect(plugin.deserializeValue(Uint8Array.of(0x01, 0x01, 0x01, 0x01, 0x02, 0x01, 0x03))).toEqual([1, 2, 3])
  })

  it("encodes an empty list as the presence byte alone", () => {
    const plugin = list(string()).bind(registry)

    expect([...plugin.serializeValue([])]).toEqual([0x01])
    expect(plugin.deserializeValue(Uint8Array.of(0x01))).toEqual([])
  })

  it("labels itself after its element type", () => {
    expect(list(list(string())).bind(registry).label).toBe("list<list<string>>")
  })

  it("prefixes element failures with the inner element segment", () => {
    const plugin = list(integer()).bind(registry)

    const err = thrown(() => plugin.checkType([1, "2"]))

    expect(err).toBeInstanceOf(BaseError)
    expect(err).toMatchObject({
      code: "type_mismatch",
      message: "inner element is of type string, expected integer",
    })
  })

  it("delegates constraints to elements", () => {
    const plugin = list(string({ maxLength: 2 })).bind(registry)

    expect(thrown(() => plugin.checkConstraints(["ab", "abc"]))).toMatchObject({
      message: "inner element is too long (maximum 2)",
    })
  })

  it("enforces maxItems", () => {
    const plugin = list(integer(), { maxItems: 2 }).bind(registry)

    expect(thrown(() => plugin.checkConstraints([1, 2, 3]))).toMatchObject({
      code: "constraint_violation",
      context: { rule: "too_many_items", items: 3, maxItems: 2 },
    })
  })

  it("rejects absent elements on decode", () => {
    const plugin = list(integer()).bind(registry)

    expect(thrown(() => plugin.deserializeValue(Uint8Array.of(0x01, 0x01, 0x05, 0x00)))).toMatchObject({
      code: "missing_value",
      message: "inner element is missing",
    })
  })

  it("normalizes to a frozen copy", () => {
    const plugin = list(integer()).bind(registry)
    const input = [1, 2]

    const normalized = plugin.normalize?.(input)
    input.push(3)

    expect(normalized).toEqual([1, 2])
    expect(Object.isFrozen(normalized)).toBe(true)
  })
})
