import { BaseError, serializeError } from "../base-error"

describe("serializeError", () => {
  beforeEach(() => {
    vi.useFakeTimers()
    vi.setSystemTime(new Date("2024-01-15T10:30:00.000Z"))
  })

  afterEach(() => {
    vi.useRealTimers()
  })

  describe("BaseError instances", () => {
    it("serializes all fields", () => {
      const err = new BaseError("unknown schema", {
        code: "unknown_schema",
        context: { schema: "Tree" },
        isRetryable: true,
        isOperational: false,
      })

      expect(serializeError(err)).toEqual({
        name: "BaseError",
        code: "unknown_schema",
        message: "unknown schema",
        context: { schema: "Tree" },
        isOperational: false,
        timestamp: "2024-01-15T10:30:00.000Z",
      })
    })

    it("omits path, cause and stack when absent", () => {
      const serialized = serializeError(new BaseError("x", { code: "x" }))

      expect("path" in serialized).toBe(false)
      expect("cause" in serialized).toBe(false)
      expect("stack" in serialized).toBe(false)
    })

    it("includes stack when requested", () => {
      const serialized = serializeError(new BaseError("x", { code: "x" }), {
        includeStack: true,
      })

      expect(serialized.stack).toContain("BaseError")
    })

    it("serializes cause chain recursively", () => {
      const root = new Error("root cause")
      const middle = new BaseError("middle", { code: "mid", cause: root })
      const outer = new BaseError("outer", { code: "outer", cause: middle })

      const serialized = serializeError(outer)

      expect(serialized.cause?.code).toBe("mid")
      expect(serialized.cause?.cause?.code).toBe("unknown")
      expect(serialized.cause?.cause?.message).toBe("root cause")
    })
  })

  describe("standard Error instances", () => {
    it("serializes with code unknown and isOperational false", () => {
      const serialized = serializeError(new TypeError("not a function"))

      expect(serialized.code).toBe("unknown")
      expect(serialized.name).toBe("TypeError")
      expect(serialized.isOperational).toBe(false)
    })
  })

  describe("non-Error values", () => {
    it("wraps string as message", () => {
      const serialized = serializeError("something went wrong")

      expect(serialized.message).toBe("something went wrong")
      expect(serialized.name).toBe("NonErrorThrown")
    })

    it("wraps object in context.value", () => {
      const obj = { foo: "bar" }

      const serialized = serializeError(obj)

      expect(serialized.context).toEqual({ value: obj })
      expect(serialized.message).toBe("Unknown error")
    })
  })
})
