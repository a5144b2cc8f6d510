import fs from "node:fs/promises"
import os from "node:os"
import path from "node:path"
import { DotenvSource } from "../dotenv-source"

describe("DotenvSource behavior", () => {
  let cwd: string

  beforeEach(async () => {
    cwd = await fs.mkdtemp(path.join(os.tmpdir(), "dotenv-test-"))
  })

  afterEach(async () => {
    await fs.rm(cwd, { recursive: true })
  })

  it("parses key=value pairs", async () => {
    await fs.writeFile(path.join(cwd, ".env"), "LEVEL=warn\nFORCE_UTC=true\nINDENTATION=off")

    const result = await new DotenvSource({ file: ".env", required: true, cwd }).load()

    expect(result).toEqual({ LEVEL: "warn", FORCE_UTC: "true", INDENTATION: "off" })
  })

  it("handles quoted values and comments", async () => {
    await fs.writeFile(
      path.join(cwd, ".env"),
      `# logging\nLEVEL='debug'\nFORCE_UTC="false"\n# end`,
    )

    const result = await new DotenvSource({ file: ".env", required: true, cwd }).load()

    expect(result).toEqual({ LEVEL: "debug", FORCE_UTC: "false" })
  })

  it("keeps only prefixed keys when a prefix is set", async () => {
    await fs.writeFile(path.join(cwd, ".env"), "DATABASE_URL=postgres://db\nLOG_LEVEL=error")

    const source = new DotenvSource({ file: ".env", required: true, cwd, prefix: "LOG_" })

    expect(await source.load()).toEqual({ LEVEL: "error" })
  })

  it("returns empty object when file missing and not required", async () => {
    const source = new DotenvSource({ file: ".env", required: false, cwd })

    expect(await source.load()).toEqual({})
  })

  it("throws when file missing and required", async () => {
    const source = new DotenvSource({ file: ".env", required: true, cwd })

    await expect(source.load()).rejects.toThrow(/ENOENT/)
  })

  it("is named after its file", () => {
    expect(new DotenvSource({ file: ".env.local", required: false }).name).toBe("dotenv:.env.local")
  })
})
