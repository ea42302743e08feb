import { Writable } from "node:stream"
import { describe, expect, it } from "vitest"

import { PinoLogger } from "../pino-logger"

function makeLineDestination() {
  const lines: string[] = []

  const destination = new Writable({
    write(chunk, _encoding, callback) {
      const line = chunk.toString("utf8").trim()
      if (line) lines.push(line)
      callback()
    },
  })

  return { lines, destination }
}

describe("PinoLogger behavior", () => {
  it("emits JSON lines with bindings to the provided destination", () => {
    const { lines, destination } = makeLineDestination()

    const logger = new PinoLogger({ destination }, { level: "trace" }, { module: "record" })

    logger.debug("schema registered", { schema: "Tree", fields: 3 })

    expect(lines).toHaveLength(1)

    const payload = JSON.parse(lines[0] ?? "{}")

    expect(payload).toMatchObject({
      msg: "schema registered",
      module: "record",
      schema: "Tree",
      fields: 3,
      level: 20,
    })
    expect(typeof payload.time).toBe("number")
  })

  it("serializes err with its cause chain", () => {
    const { lines, destination } = makeLineDestination()

    const logger = new PinoLogger({ destination }, { level: "info" })
    const err = new Error("outer", { cause: new Error("inner") })

    logger.warn("failed to decode struct", { err })

    const payload = JSON.parse(lines[0] ?? "{}")

    expect(payload.err.type).toBe("Error")
    expect(payload.err.message).toBe("outer")
    expect(payload.err.cause.message).toBe("inner")
  })

  it("child() inherits the base logger sink and level", () => {
    const { lines, destination } = makeLineDestination()

    const base = new PinoLogger({ destination }, { level: "warn" }, { module: "record" })
    const child = base.child({ schema: "Tree" })

    child.info("ignored")
    child.warn("logged")

    expect(lines).toHaveLength(1)
    expect(JSON.parse(lines[0] ?? "{}")).toMatchObject({
      msg: "logged",
      module: "record",
      schema: "Tree",
    })
  })
})
