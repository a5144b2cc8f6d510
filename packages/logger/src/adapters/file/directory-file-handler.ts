import fs from "node:fs"
import path from "node:path"
import { ConfigurationError, ResourceError } from "@sectionlog/errors"
import { formatLogDate } from "../../core/render/timestamp"
import type { LogHandler } from "../../ports/handler"
import type { LogEvent } from "../../ports/log-event"

export type DirectoryFileHandlerOptions = {
  /** Directory holding the log files. Created if missing. */
  dir: string

  /**
   * Keep existing content. When `false`, an existing file is emptied once,
   * before this handler's first write. Requires `shareFile: false`.
   *
   * @default true
   */
  append?: boolean

  /**
   * Let every section write to the same file. When `false`, file names are
   * prefixed with `<section>.`.
   *
   * @default true
   */
  shareFile?: boolean

  /**
   * Name files after the event's calendar day (`yyyy-MM-dd.log`) instead of
   * `latest.log`.
   *
   * @default true
   */
  useDate?: boolean

  /** Fixed file name (with extension) overriding every rule above. */
  customName?: string | undefined
}

/**
 * Appends each event's plain rendering to a file in {@link dir}, chosen per
 * event.
 */
export class DirectoryFileHandler implements LogHandler {
  readonly dir: string
  readonly append: boolean
  readonly shareFile: boolean
  readonly useDate: boolean
  readonly customName: string | undefined

  private handledOverwrite = false

  constructor(opts: DirectoryFileHandlerOptions) {
    this.dir = path.resolve(opts.dir)
    this.append = opts.append ?? true
    this.shareFile = opts.shareFile ?? true
    this.useDate = opts.useDate ?? true
    this.customName = opts.customName

    if (this.shareFile && !this.append) {
      throw new ConfigurationError("A shared log file cannot be truncated; enable append or disable shareFile", {
        context: { dir: this.dir },
      })
    }

    try {
      fs.mkdirSync(this.dir, { recursive: true })
    } catch (err) {
      throw new ResourceError(`Unable to create log directory ${this.dir}`, {
        cause: err,
        context: { path: this.dir },
      })
    }
  }

  fileNameFor(event: LogEvent): string {
    if (this.customName !== undefined) return this.customName

    const name = this.useDate ? `${formatLogDate(event.timestamp)}.log` : "latest.log"

    return this.shareFile ? name : `${event.section}.${name}`
  }

  handle(event: LogEvent): void {
    const file = path.join(this.dir, this.fileNameFor(event))

    try {
      if (!this.handledOverwrite && !this.append && fs.existsSync(file)) {
        fs.writeFileSync(file, "")
      }
      this.handledOverwrite = true

      fs.appendFileSync(file, `${event.generatedMessage}\n`)
    } catch (err) {
      throw new ResourceError(`Failed to write log file ${file}`, {
        cause: err,
        context: { path: file },
      })
    }
  }
}
