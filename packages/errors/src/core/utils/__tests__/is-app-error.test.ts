import { BaseError } from "../../base-error"
import { isAppError } from "../is-app-error"

function duck(overrides: Record<string, unknown> = {}) {
  return {
    name: "DuckError",
    message: "quack",
    reason: "quack",
    code: "duck",
    context: {},
    path: [],
    isRetryable: false,
    isOperational: true,
    timestamp: new Date(),
    ...overrides,
  }
}

describe("isAppError", () => {
  it("accepts BaseError and its subclasses", () => {
    class CodecFailure extends BaseError<"truncated_data"> {}

    expect(isAppError(new BaseError("x", { code: "x" }))).toBe(true)
    expect(isAppError(new CodecFailure("x", { code: "truncated_data" }))).toBe(true)
  })

  it("accepts duck-typed objects with every field", () => {
    expect(isAppError(duck())).toBe(true)
  })

  it("rejects non-objects and plain errors", () => {
    expect(isAppError(null)).toBe(false)
    expect(isAppError(undefined)).toBe(false)
    expect(isAppError("error")).toBe(false)
    expect(isAppError(new Error("standard"))).toBe(false)
  })

  it.each(["code", "context", "path", "reason", "isRetryable", "isOperational", "timestamp"])(
    "rejects objects missing %s",
    (key) => {
      expect(isAppError(duck({ [key]: undefined }))).toBe(false)
    },
  )

  it("rejects an invalid timestamp", () => {
    expect(isAppError(duck({ timestamp: new Date("invalid") }))).toBe(false)
  })
})
