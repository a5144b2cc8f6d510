import fs from "node:fs/promises"
import path from "node:path"
import { hasErrorCode } from "@sectionlog/errors"
import { parse } from "dotenv"
import type { ConfigSource } from "../../ports/source"

export type DotenvSourceOptions = {
  /**
   * Path to the .env file, absolute or relative to `cwd`.
   *
   * @example ".env", ".env.production"
   */
  file: string

  /**
   * Whether the file must exist. A missing optional file loads as `{}`.
   */
  required: boolean

  /** @default process.cwd() */
  cwd?: string

  /**
   * Only keys starting with this prefix are read; the prefix is stripped.
   * Useful when the logger shares a .env file with the application.
   */
  prefix?: string
}

export class DotenvSource implements ConfigSource {
  readonly name: string

  constructor(private readonly opts: DotenvSourceOptions) {
    this.name = `dotenv:${opts.file}`
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

    return stripPrefix(parse(content), this.opts.prefix)
  }
}

function stripPrefix(
  values: Record<string, string>,
  prefix: string | undefined,
): Record<string, string> {
  if (!prefix) return { ...values }

  return Object.fromEntries(
    Object.entries(values)
      .filter(([key]) => key.startsWith(prefix))
      .map(([key, value]) => [key.slice(prefix.length), value]),
  )
}
