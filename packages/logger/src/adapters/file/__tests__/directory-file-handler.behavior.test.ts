import fs from "node:fs"
import path from "node:path"
import { ConfigurationError, ResourceError } from "@sectionlog/errors"

import { BASE_INSTANT, makeEvent } from "../../../tests/utils/make-event"
import { makeTempDir, removeTempDir } from "../../../tests/utils/temp-dir"
import { DirectoryFileHandler } from "../directory-file-handler"
import { readLines } from "./file-harness"

describe("DirectoryFileHandler behavior", () => {
  let dir: string

  beforeEach(() => {
    dir = makeTempDir("dir-handler")
  })

  afterEach(() => {
    removeTempDir(dir)
  })

  describe("file names", () => {
    it("uses the event's calendar day by default", () => {
      const handler = new DirectoryFileHandler({ dir })

      expect(handler.fileNameFor(makeEvent())).toBe("2024-01-15.log")
    })

    it("uses the day of the event's own offset", () => {
      const handler = new DirectoryFileHandler({ dir })
      const event = makeEvent({
        timestamp: { instant: new Date(Date.UTC(2024, 0, 15, 23, 30)), utcOffsetMinutes: 120 },
      })

      expect(handler.fileNameFor(event)).toBe("2024-01-16.log")
    })

    it("uses latest.log without dates", () => {
      const handler = new DirectoryFileHandler({ dir, useDate: false })

      expect(handler.fileNameFor(makeEvent())).toBe("latest.log")
    })

    it("prefixes the section when files are not shared", () => {
      const handler = new DirectoryFileHandler({ dir, shareFile: false })

      expect(handler.fileNameFor(makeEvent({ section: "billing" }))).toBe("billing.2024-01-15.log")
    })

    it("lets a custom name override everything", () => {
      const handler = new DirectoryFileHandler({ dir, shareFile: false, customName: "all.txt" })

      expect(handler.fileNameFor(makeEvent())).toBe("all.txt")
    })
  })

  it("rejects truncating a shared file", () => {
    expect(() => new DirectoryFileHandler({ dir, append: false })).toThrow(ConfigurationError)
  })

  it("creates the directory", () => {
    const nested = path.join(dir, "logs", "app")

    new DirectoryFileHandler({ dir: nested }).handle(makeEvent())

    expect(readLines(path.join(nested, "2024-01-15.log"))).toEqual([
      "[2024-01-15 10:30:00 +0000] Info : svc: hello",
    ])
  })

  it("fails with a ResourceError when the directory cannot be created", () => {
    const blocker = path.join(dir, "blocker")
    fs.writeFileSync(blocker, "")

    expect(() => new DirectoryFileHandler({ dir: path.join(blocker, "logs") })).toThrow(
      ResourceError,
    )
  })

  it("switches files when the day changes", () => {
    const handler = new DirectoryFileHandler({ dir })
    const nextDay = BASE_INSTANT + 24 * 60 * 60 * 1000

    handler.handle(makeEvent({ body: "monday" }))
    handler.handle(
      makeEvent({ body: "tuesday", timestamp: { instant: new Date(nextDay), utcOffsetMinutes: 0 } }),
    )

    expect(readLines(path.join(dir, "2024-01-15.log"))).toEqual([
      "[2024-01-15 10:30:00 +0000] Info : svc: monday",
    ])
    expect(readLines(path.join(dir, "2024-01-16.log"))).toEqual([
      "[2024-01-16 10:30:00 +0000] Info : svc: tuesday",
    ])
  })

  it("truncates an existing file once, at the first event, when not appending", () => {
    const file = path.join(dir, "svc.latest.log")
    fs.writeFileSync(file, "stale\n")
    const handler = new DirectoryFileHandler({ dir, append: false, shareFile: false, useDate: false })

    expect(readLines(file)).toEqual(["stale"])

    handler.handle(makeEvent({ body: "one" }))
    handler.handle(makeEvent({ body: "two" }))

    expect(readLines(file)).toEqual([
      "[2024-01-15 10:30:00 +0000] Info : svc: one",
      "[2024-01-15 10:30:00 +0000] Info : svc: two",
    ])
  })
})
