import fs from "node:fs"
import { hasErrorCode, ResourceError } from "@sectionlog/errors"

/**
 * Exclusive advisory lock on a log file, held as a `<file>.lock` sidecar
 * created with `O_EXCL` and containing the owner's pid.
 *
 * A lock left behind by a process that no longer exists is reclaimed.
 */
export class FileLock {
  private released = false

  private constructor(readonly lockPath: string) {}

  /**
   * @throws ResourceError when another live process (or another handler in
   * this process) holds the lock, or the sidecar cannot be created
   */
  static acquire(file: string): FileLock {
    const lockPath = `${file}.lock`

    try {
      createLockFile(lockPath)
    } catch (err) {
      if (!hasErrorCode(err, "EEXIST") || !isStale(lockPath)) {
        throw new ResourceError(`Unable to lock log file ${file}`, {
          cause: err,
          context: { path: file, lockPath },
        })
      }

      reclaim(file, lockPath)
    }

    return new FileLock(lockPath)
  }

  get isReleased(): boolean {
    return this.released
  }

  /** Removes the sidecar. Idempotent. */
  release(): void {
    if (this.released) return
    this.released = true

    fs.rmSync(this.lockPath, { force: true })
  }
}

// Leaves no sidecar behind when the pid cannot be written.
function createLockFile(lockPath: string): void {
  const fd = fs.openSync(lockPath, "wx")

  try {
    fs.writeSync(fd, String(process.pid))
  } catch (err) {
    fs.closeSync(fd)
    fs.rmSync(lockPath, { force: true })
    throw err
  }

  fs.closeSync(fd)
}

function reclaim(file: string, lockPath: string): void {
  try {
    fs.rmSync(lockPath, { force: true })
    createLockFile(lockPath)
  } catch (err) {
    throw new ResourceError(`Unable to reclaim stale lock of log file ${file}`, {
      cause: err,
      context: { path: file, lockPath },
    })
  }
}

function isStale(lockPath: string): boolean {
  const pid = readOwnerPid(lockPath)
  if (pid === undefined) return false

  try {
    process.kill(pid, 0)
    return false
  } catch (err) {
    return hasErrorCode(err, "ESRCH")
  }
}

function readOwnerPid(lockPath: string): number | undefined {
  try {
    const pid = Number.parseInt(fs.readFileSync(lockPath, "utf-8").trim(), 10)

    return Number.isInteger(pid) && pid > 0 ? pid : undefined
  } catch (err) {
    // Released between the EEXIST and this read; the next acquire attempt decides.
    if (hasErrorCode(err, "ENOENT")) return undefined

    throw new ResourceError(`Unable to read the owner of lock ${lockPath}`, {
      cause: err,
      context: { lockPath },
    })
  }
}
