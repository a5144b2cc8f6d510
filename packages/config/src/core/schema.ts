import { logLevelNames } from "@sectionlog/logger"
import { z } from "zod"

// Env and dotenv values arrive as strings ("true", "0", "off", ...).
const flag = z.union([z.boolean(), z.stringbool()])

export const loggerSettingsSchema = z.object({
  level: z.string().trim().toLowerCase().pipe(z.enum(logLevelNames)).default("info"),
  indentation: flag.default(true),
  forceUtc: flag.default(false),
})

export type LoggerSettings = z.infer<typeof loggerSettingsSchema>

export type LoggerSettingsKey = keyof LoggerSettings

export const loggerSettingsKeys: readonly LoggerSettingsKey[] = loggerSettingsSchema.keyof().options
