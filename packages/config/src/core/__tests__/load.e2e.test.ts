import fs from "node:fs/promises"
import os from "node:os"
import path from "node:path"
import { BaseError } from "@recordwire/errors"
import { z } from "zod"
import { DotenvSource } from "../../adapters/dotenv/dotenv-source"
import { EnvSource } from "../../adapters/env/env-source"
import { ObjectSource } from "../../adapters/object/object-source"
import { loadConfig } from "../load"

const schema = z.object({
  MAX_MESSAGE_BYTES: z.coerce.number().int().positive(),
  LOG_LEVEL: z.enum(["debug", "info", "warn"]).default("info"),
})

describe("loadConfig e2e", () => {
  let cwd: string

  beforeEach(async () => {
    cwd = await fs.mkdtemp(path.join(os.tmpdir(), "recordwire-load-"))
  })

  afterEach(async () => {
    await fs.rm(cwd, { recursive: true })
  })

  it("coerces values from a single env source", async () => {
    const config = await loadConfig({
      schema,
      sources: [new EnvSource({ env: { MAX_MESSAGE_BYTES: "4096" } })],
    })

    expect(config.value).toEqual({ MAX_MESSAGE_BYTES: 4096, LOG_LEVEL: "info" })
    expect(config.explain("LOG_LEVEL")).toBe("default")
  })

  it("lets later sources override earlier ones", async () => {
    await fs.writeFile(path.join(cwd, ".env"), "MAX_MESSAGE_BYTES=1024\nLOG_LEVEL=debug")

    const config = await loadConfig({
      schema,
      sources: [
        new DotenvSource({ file: ".env", required: true, cwd }),
        new EnvSource({ env: { LOG_LEVEL: "warn" } }),
        new ObjectSource({ MAX_MESSAGE_BYTES: 64 }),
      ],
    })

    expect(config.get("MAX_MESSAGE_BYTES")).toBe(64)
    expect(config.get("LOG_LEVEL")).toBe("warn")
    expect(config.explain("MAX_MESSAGE_BYTES")).toBe("object:overrides")
    expect(config.sourcesUsed()).toEqual(["object:overrides", "env"])
  })

  it("ignores undefined values from a source", async () => {
    const config = await loadConfig({
      schema,
      sources: [
        new EnvSource({ env: { MAX_MESSAGE_BYTES: "8" } }),
        new ObjectSource({ MAX_MESSAGE_BYTES: undefined }),
      ],
    })

    expect(config.get("MAX_MESSAGE_BYTES")).toBe(8)
  })

  it("reports unknown keys", async () => {
    const config = await loadConfig({
      schema,
      sources: [new EnvSource({ env: { MAX_MESSAGE_BYTES: "8", MAX_MESAGE_BYTE: "9" } })],
    })

    expect(config.unknownKeys()).toEqual(["MAX_MESAGE_BYTE"])
  })

  it("throws config_invalid naming the failing keys", async () => {
    const load = loadConfig({
      schema,
      sources: [new EnvSource({ env: { MAX_MESSAGE_BYTES: "-1", LOG_LEVEL: "loud" } })],
    })

    await expect(load).rejects.toBeInstanceOf(BaseError)
    await expect(load).rejects.toMatchObject({
      code: "config_invalid",
      context: { keys: ["MAX_MESSAGE_BYTES", "LOG_LEVEL"] },
    })
    await expect(load).rejects.toThrow(/Configuration validation failed/)
  })
})
