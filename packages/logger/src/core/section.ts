import { ConfigurationError } from "@sectionlog/errors"
import { z } from "zod"

export const SECTION_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*$/

const sectionSchema = z
  .string()
  .trim()
  .min(1, "Section must not be empty")
  .regex(SECTION_PATTERN, "Section must be an identifier (letters, digits and _, not starting with a digit)")

/**
 * Trims and validates a logger section name.
 *
 * @throws ConfigurationError when the name is empty or not an identifier
 */
export function parseSection(section: string): string {
  const result = sectionSchema.safeParse(section)

  if (!result.success) {
    throw new ConfigurationError(`Invalid logger section:\n${z.prettifyError(result.error)}`, {
      context: { section },
    })
  }

  return result.data
}
