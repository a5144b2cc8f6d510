import {
  isAtLeast,
  isLogLevelName,
  LogLevels,
  logLevelNames,
  resolveLogLevel,
} from "../log-level"

describe("log levels", () => {
  it("ranks levels from debug (0) to fatal (4) in declaration order", () => {
    expect(logLevelNames.map((name) => LogLevels[name].importance)).toEqual([0, 1, 2, 3, 4])
  })

  it("carries display name, color and stream per level", () => {
    expect(LogLevels.debug).toEqual({
      key: "debug",
      name: "Debug",
      ansiColor: 90,
      importance: 0,
      useStderr: false,
    })
    expect(LogLevels.info.ansiColor).toBe(94)
    expect(LogLevels.warn.ansiColor).toBe(93)
    expect(LogLevels.error.useStderr).toBe(true)
    expect(LogLevels.fatal).toMatchObject({ name: "Fatal", ansiColor: 91, useStderr: true })
  })

  it("is frozen", () => {
    expect(Object.isFrozen(LogLevels)).toBe(true)
    expect(Object.isFrozen(LogLevels.info)).toBe(true)
  })

  describe("isAtLeast", () => {
    it("compares by importance", () => {
      expect(isAtLeast(LogLevels.warn, LogLevels.info)).toBe(true)
      expect(isAtLeast(LogLevels.info, LogLevels.info)).toBe(true)
      expect(isAtLeast(LogLevels.debug, LogLevels.info)).toBe(false)
    })

    it("uses the rank, not the identity of the level object", () => {
      const customInfo = { ...LogLevels.info, importance: 10 }

      expect(isAtLeast(customInfo, LogLevels.fatal)).toBe(true)
    })
  })

  it("resolveLogLevel accepts names and level objects", () => {
    expect(resolveLogLevel("warn")).toBe(LogLevels.warn)
    expect(resolveLogLevel(LogLevels.error)).toBe(LogLevels.error)
  })

  it("isLogLevelName narrows known names only", () => {
    expect(isLogLevelName("fatal")).toBe(true)
    expect(isLogLevelName("trace")).toBe(false)
    expect(isLogLevelName(3)).toBe(false)
  })
})
