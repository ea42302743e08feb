import { thrown } from "../../../tests/utils/thrown"
import { decodeLength, encodeLength } from "../length-codec"

describe("encodeLength", () => {
  it.each([
    [0, [0x00]],
    [5, [0x05]],
    [0xf9, [0xf9]],
    [0xfa, [0xfa, 0xfa]],
    [300, [0xfb, 0x01, 0x2c]],
    [65_536, [0xfc, 0x01, 0x00, 0x00]],
    [2 ** 48 - 1, [0xff, 0xff, 0xff, 0xff, 0xff, 0xff, 0xff]],
  ])("encodes %i", (length, expected) => {
    expect([...encodeLength(length)]).toEqual(expected)
  })

  it("rejects lengths needing more than six bytes", () => {
    expect(thrown(() => encodeLength(2 ** 48))).toMatchObject({
      code: "length_too_large",
      context: { length: 2 ** 48, bytes: 7 },
    })
  })
})

describe("decodeLength", () => {
  it("reads inline lengths", () => {
    expect(decodeLength(Uint8Array.of(0x05))).toEqual({ length: 5, bytesRead: 1 })
  })

  it("reads extended lengths at an offset", () => {
    expect(decodeLength(Uint8Array.of(0xaa, 0xfb, 0x01, 0x2c), 1)).toEqual({ length: 300, bytesRead: 3 })
  })

  it("inverts encodeLength across the header boundaries", () => {
    for (const length of [0, 0xf9, 0xfa, 0xff, 0x100, 0xffff, 0x1_0000, 2 ** 32, 2 ** 48 - 1]) {
      const header = encodeLength(length)
      expect(decodeLength(header)).toEqual({ length, bytesRead: header.length })
    }
  })

  it("fails with truncated_data when the header is missing", () => {
    expect(thrown(() => decodeLength(new Uint8Array()))).toMatchObject({ code: "truncated_data" })
  })

  it("fails with truncated_data when length bytes are missing", () => {
    expect(thrown(() => decodeLength(Uint8Array.of(0xfb, 0x01)))).toMatchObject({
      code: "truncated_data",
      context: { offset: 1, needed: 2, available: 1 },
    })
  })
})
