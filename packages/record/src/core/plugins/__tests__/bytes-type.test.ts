import { thrown } from "../../../tests/utils/thrown"
import { createSchemaRegistry } from "../../schema/schema-registry"
import { bytes } from "../bytes-type"

describe("bytes()", () => {
  const registry = createSchemaRegistry()

  it("enforces maxLength in bytes", () => {
    const plugin = bytes({ maxLength: 2 }).bind(registry)

    expect(() => plugin.checkConstraints(Uint8Array.of(1, 2))).not.toThrow()
    expect(thrown(() => plugin.checkConstraints(Uint8Array.of(1, 2, 3)))).toMatchObject({
      code: "constraint_violation",
      context: { rule: "too_long", length: 3, maxLength: 2 },
    })
  })

  it("decodes into a copy detached from the input buffer", () => {
    const plugin = bytes().bind(registry)
    const payload = Uint8Array.of(0x01, 0xaa, 0xbb)

    const decoded = plugin.deserializeValue(payload)
    payload[1] = 0x00

    expect([...decoded]).toEqual([0xaa, 0xbb])
  })
})
