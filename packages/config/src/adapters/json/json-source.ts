import fs from "node:fs/promises"
import path from "node:path"
import { ConfigurationError, hasErrorCode } from "@sectionlog/errors"
import type { ConfigSource } from "../../ports/source"

export type JsonSourceOptions = {
  /**
   * Path to the JSON file, absolute or relative to `cwd`.
   *
   * @example "logging.json", "./config/app.json"
   */
  file: string

  /**
   * Whether the file must exist. A missing optional file loads as `{}`.
   */
  required: boolean

  /** @default process.cwd() */
  cwd?: string

  /**
   * Read the settings from this top-level property instead of the whole
   * document, e.g. `"logging"` for `{ "logging": { "level": "warn" } }`.
   * A missing property loads as `{}`.
   */
  key?: string
}

export class JsonSource implements ConfigSource {
  readonly name: string

  constructor(private readonly opts: JsonSourceOptions) {
    this.name = opts.key ? `json:${opts.file}#${opts.key}` : `json:${opts.file}`
  }

  async load(): Promise<Record<string, unknown>> {
    const cwd = this.opts.cwd ?? process.cwd()
    const filePath = path.resolve(cwd, this.opts.file)

    let content: string
    try {
      content = await fs.readFile(filePath, "utf-8")
    } catch (err) {
      if (!this.opts.required && hasErrorCode(err, "ENOENT")) return {}
      throw err
    }

    const document = toRecord(JSON.parse(content), filePath)
    if (this.opts.key === undefined) return document

    const section = document[this.opts.key]

    return section === undefined ? {} : toRecord(section, `${filePath}#${this.opts.key}`)
  }
}

function toRecord(value: unknown, where: string): Record<string, unknown> {
  if (typeof value !== "object" || value === null || Array.isArray(value)) {
    throw new ConfigurationError(`Expected a JSON object in ${where}`, {
      context: { path: where },
    })
  }

  return Object.fromEntries(Object.entries(value))
}
