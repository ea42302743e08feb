import { EnvSource } from "../env-source"

describe("EnvSource behavior", () => {
  it("returns all env vars when no prefix", async () => {
    const source = new EnvSource({ env: { LOG_LEVEL: "debug", PATH: "/usr/bin" } })

    expect(await source.load()).toEqual({ LOG_LEVEL: "debug", PATH: "/usr/bin" })
  })

  it("filters and strips prefix when provided", async () => {
    const env = {
      RECORDWIRE_STRICT_CHUNK_COUNT: "false",
      RECORDWIRE_LOG_LEVEL: "warn",
      OTHER_KEY: "ignored",
    }

    const source = new EnvSource({ env, prefix: "RECORDWIRE_" })

    expect(await source.load()).toEqual({
      STRICT_CHUNK_COUNT: "false",
      LOG_LEVEL: "warn",
    })
  })

  it("reads process.env when no env is injected", async () => {
    vi.stubEnv("RECORDWIRE_TEST_ONLY", "yes")

    const source = new EnvSource({ prefix: "RECORDWIRE_TEST_" })

    expect(await source.load()).toEqual({ ONLY: "yes" })

    vi.unstubAllEnvs()
  })
})
