import { ConfigurationError } from "@sectionlog/errors"

import { parseSection } from "../section"

describe("parseSection", () => {
  it.each(["svc", "Billing", "_internal", "worker_2", "A1_b2"])("accepts %j", (name) => {
    expect(parseSection(name)).toBe(name)
  })

  it("trims surrounding whitespace", () => {
    expect(parseSection("  billing\t")).toBe("billing")
  })

  it.each(["", "   ", "2fast", "with space", "dash-ed", "dotted.name", "naïve"])(
    "rejects %j with a ConfigurationError",
    (name) => {
      expect(() => parseSection(name)).toThrow(ConfigurationError)
    },
  )

  it("keeps the offending input in the error context", () => {
    try {
      parseSection("bad name")
      expect.unreachable()
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigurationError)
      if (error instanceof ConfigurationError) {
        expect(error.context).toEqual({ section: "bad name" })
        expect(error.message).toContain("Invalid logger section")
      }
    }
  })
})
