import { BaseError } from "@bytewise/errors"
import { z } from "zod"
import { EnvSource } from "../../adapters/env/env-source"
import { ObjectSource } from "../../adapters/object/object-source"
import { loadConfig } from "../load"

const schema = z.object({
  BYTE_ORDER: z.enum(["big-endian", "little-endian"]).default("big-endian"),
  CHUNK: z.coerce.number().int().positive().default(64),
})

describe("loadConfig", () => {
  it("applies schema defaults when no source provides a key", () => {
    const config = loadConfig({ schema, sources: [new ObjectSource({})] })

    expect(config.value).toEqual({ BYTE_ORDER: "big-endian", CHUNK: 64 })
    expect(config.explain("BYTE_ORDER")).toBe("default")
  })

  it("coerces string values", () => {
    const config = loadConfig({
      schema,
      sources: [new EnvSource({ env: { CHUNK: "128" } })],
    })

    expect(config.get("CHUNK")).toBe(128)
    expect(config.explain("CHUNK")).toBe("env")
  })

  it("lets later sources override earlier ones", () => {
    const config = loadConfig({
      schema,
      sources: [
        new EnvSource({ env: { BYTE_ORDER: "big-endian", CHUNK: "8" } }),
        new ObjectSource({ BYTE_ORDER: "little-endian" }),
      ],
    })

    expect(config.get("BYTE_ORDER")).toBe("little-endian")
    expect(config.explain("BYTE_ORDER")).toBe("object:overrides")
    expect(config.get("CHUNK")).toBe(8)
    expect(config.sourcesUsed()).toEqual(["object:overrides", "env"])
  })

  it("ignores undefined values", () => {
    const config = loadConfig({
      schema,
      sources: [
        new ObjectSource({ BYTE_ORDER: "little-endian" }),
        new EnvSource({ env: { BYTE_ORDER: undefined } }),
      ],
    })

    expect(config.get("BYTE_ORDER")).toBe("little-endian")
  })

  it("reports unknown keys", () => {
    const config = loadConfig({
      schema,
      sources: [new ObjectSource({ BYTE_ORDR: "big-endian" })],
    })

    expect(config.unknownKeys()).toEqual(["BYTE_ORDR"])
  })

  it("throws config_invalid on validation failure", () => {
    const load = () =>
      loadConfig({ schema, sources: [new ObjectSource({ BYTE_ORDER: "middle-endian" })] })

    expect(load).toThrow(BaseError)
    expect(load).toThrow(/Configuration validation failed/)

    try {
      load()
    } catch (err) {
      expect(err).toBeInstanceOf(BaseError)
      expect(err).toMatchObject({ code: "config_invalid" })
    }
  })
})
