import fs from "node:fs/promises"
import os from "node:os"
import path from "node:path"
import { loadLoggerConfig } from "../../core/load"
import type { ConfigSource } from "../source"

/** Settings every harness stores in its source's own format. */
export type ContractSettings = {
  level: "warn"
  forceUtc: true
}

export const contractSettings: ContractSettings = { level: "warn", forceUtc: true }

export type ConfigSourceHarness = {
  name: string
  make: (
    cwd: string,
    settings: ContractSettings,
  ) => Promise<{
    source: ConfigSource
    cleanup?: () => Promise<void>
  }>
  setup: (cwd: string, settings: ContractSettings) => Promise<void>
}

export function describeConfigSourceContract(h: ConfigSourceHarness) {
  describe(`${h.name} (ConfigSource contract)`, () => {
    let cwd: string
    let source: ConfigSource
    let cleanup: (() => Promise<void>) | undefined

    beforeEach(async () => {
      cwd = await fs.mkdtemp(path.join(os.tmpdir(), "sectionlog-config-"))
      await h.setup(cwd, contractSettings)
      const result = await h.make(cwd, contractSettings)

      source = result.source
      cleanup = result.cleanup
    })

    afterEach(async () => {
      await cleanup?.()
      await fs.rm(cwd, { recursive: true, force: true })
    })

    it("has a non-empty name", () => {
      expect(typeof source.name).toBe("string")
      expect(source.name.trim()).not.toBe("")
    })

    it("load() resolves to a plain object", async () => {
      const result = await source.load()

      expect(Array.isArray(result)).toBe(false)
      expect(Object.getPrototypeOf(result)).toBe(Object.prototype)
    })

    it("load() values are strings or booleans", async () => {
      const result = await source.load()

      for (const value of Object.values(result)) {
        expect(["string", "boolean", "undefined"]).toContain(typeof value)
      }
    })

    it("load() is idempotent and hands out a fresh object", async () => {
      const first = await source.load()
      const snapshot = { ...first }
      first["level"] = "fatal"

      const second = await source.load()

      expect(second).toEqual(snapshot)
    })

    it("supplies settings that validate into the stored values", async () => {
      const config = await loadLoggerConfig({ sources: [source] })

      expect(config.value).toEqual({ level: "warn", indentation: true, forceUtc: true })
      expect(config.unknownKeys()).toEqual([])
    })

    it("is named as the provenance of the settings it supplied", async () => {
      const config = await loadLoggerConfig({ sources: [source] })

      expect(config.explain("level")).toBe(source.name)
      expect(config.explain("forceUtc")).toBe(source.name)
      expect(config.explain("indentation")).toBe("default")
      expect(config.sourcesUsed()).toEqual([source.name])
    })
  })
}
