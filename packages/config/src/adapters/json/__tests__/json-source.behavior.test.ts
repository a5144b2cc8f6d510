import fs from "node:fs/promises"
import os from "node:os"
import path from "node:path"
import { ConfigurationError } from "@sectionlog/errors"
import { JsonSource } from "../json-source"

describe("JsonSource behavior", () => {
  let cwd: string

  beforeEach(async () => {
    cwd = await fs.mkdtemp(path.join(os.tmpdir(), "json-test-"))
  })

  afterEach(async () => {
    await fs.rm(cwd, { recursive: true })
  })

  async function writeJson(value: unknown, file = "logging.json") {
    await fs.writeFile(path.join(cwd, file), JSON.stringify(value))
  }

  it("parses a JSON object, keeping value types", async () => {
    await writeJson({ level: "debug", forceUtc: true })

    const result = await new JsonSource({ file: "logging.json", required: true, cwd }).load()

    expect(result).toEqual({ level: "debug", forceUtc: true })
  })

  it("reads a nested key", async () => {
    await writeJson({ server: { port: 8080 }, logging: { level: "error" } }, "app.json")

    const source = new JsonSource({ file: "app.json", required: true, cwd, key: "logging" })

    expect(await source.load()).toEqual({ level: "error" })
    expect(source.name).toBe("json:app.json#logging")
  })

  it("loads an absent nested key as empty", async () => {
    await writeJson({ server: {} }, "app.json")

    const source = new JsonSource({ file: "app.json", required: true, cwd, key: "logging" })

    expect(await source.load()).toEqual({})
  })

  it("rejects a document that is not an object", async () => {
    await writeJson(["level", "debug"])

    const source = new JsonSource({ file: "logging.json", required: true, cwd })

    await expect(source.load()).rejects.toThrow(ConfigurationError)
  })

  it("rejects a nested key that is not an object", async () => {
    await writeJson({ logging: "verbose" }, "app.json")

    const source = new JsonSource({ file: "app.json", required: true, cwd, key: "logging" })

    await expect(source.load()).rejects.toThrow(ConfigurationError)
  })

  it("returns empty object when file missing and not required", async () => {
    const source = new JsonSource({ file: "logging.json", required: false, cwd })

    expect(await source.load()).toEqual({})
  })

  it("throws when file missing and required", async () => {
    const source = new JsonSource({ file: "logging.json", required: true, cwd })

    await expect(source.load()).rejects.toThrow(/ENOENT/)
  })

  it("throws on invalid JSON", async () => {
    await fs.writeFile(path.join(cwd, "logging.json"), "{ invalid json }")

    const source = new JsonSource({ file: "logging.json", required: true, cwd })

    await expect(source.load()).rejects.toThrow(SyntaxError)
  })
})
