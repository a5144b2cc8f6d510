import fs from "node:fs"
import path from "node:path"
import { ResourceError } from "@sectionlog/errors"
import type { LogHandler } from "../../ports/handler"
import type { LogEvent } from "../../ports/log-event"
import { FileLock } from "./file-lock"

export type FileHandlerOptions = {
  /** Path of the log file. Parent directories are created as needed. */
  file: string

  /**
   * Keep existing content. When `false`, the file is emptied right before
   * the first event is written, and only then.
   *
   * @default true
   */
  append?: boolean

  /**
   * Hold an exclusive lock on the file for the handler's lifetime.
   *
   * @default false
   */
  lock?: boolean
}

/**
 * Appends each event's plain rendering to a single file kept open from
 * construction until {@link dispose}.
 */
export class FileHandler implements LogHandler {
  readonly file: string
  readonly append: boolean

  private fd: number | null
  private readonly lock: FileLock | null
  private truncatePending: boolean
  private readonly suppressed: unknown[] = []

  /**
   * @throws ResourceError when the directory cannot be created, the lock is
   * held elsewhere, or the file cannot be opened; nothing is left open
   */
  constructor(opts: FileHandlerOptions) {
    this.file = path.resolve(opts.file)
    this.append = opts.append ?? true
    this.truncatePending = !this.append

    createParentDirectory(this.file)

    const lock = opts.lock ? FileLock.acquire(this.file) : null

    this.fd = openForAppend(this.file, lock)
    this.lock = lock
  }

  get isOpen(): boolean {
    return this.fd !== null
  }

  get isLocked(): boolean {
    return this.lock !== null && !this.lock.isReleased
  }

  handle(event: LogEvent): void {
    if (this.fd === null) {
      throw new ResourceError(`Log file ${this.file} is closed`, {
        context: { path: this.file },
      })
    }

    try {
      if (this.truncatePending) {
        fs.ftruncateSync(this.fd, 0)
        this.truncatePending = false
      }

      fs.writeSync(this.fd, `${event.generatedMessage}\n`)
    } catch (err) {
      throw new ResourceError(`Failed to write log file ${this.file}`, {
        cause: err,
        context: { path: this.file },
      })
    }
  }

  /** Errors suppressed by {@link dispose}, oldest first. */
  get disposeFailures(): readonly unknown[] {
    return [...this.suppressed]
  }

  /**
   * Closes the file and releases the lock. Idempotent. Failures do not
   * propagate; they are kept in {@link disposeFailures}.
   */
  dispose(): void {
    if (this.fd !== null) {
      const fd = this.fd
      this.fd = null

      try {
        fs.closeSync(fd)
      } catch (err) {
        this.suppressed.push(err)
      }
    }

    try {
      this.lock?.release()
    } catch (err) {
      this.suppressed.push(err)
    }
  }
}

function createParentDirectory(file: string): void {
  try {
    fs.mkdirSync(path.dirname(file), { recursive: true })
  } catch (err) {
    throw new ResourceError(`Unable to create directory for log file ${file}`, {
      cause: err,
      context: { path: file },
    })
  }
}

function openForAppend(file: string, lock: FileLock | null): number {
  try {
    return fs.openSync(file, "a")
  } catch (err) {
    throw new ResourceError(`Unable to open log file ${file}`, {
      cause: err,
      context: { path: file, lockReleaseError: releaseQuietly(lock) },
    })
  }
}

// Returns the release failure instead of throwing it, so the open failure stays the reported one.
function releaseQuietly(lock: FileLock | null): unknown {
  try {
    lock?.release()
    return undefined
  } catch (err) {
    return err
  }
}
