import { toDisplayString } from "@sectionlog/errors"
import type { LogEvent } from "../../ports/log-event"
import type { Trace } from "../stack/trace"
import { formatTimestamp } from "./timestamp"

export type RenderableEvent = Pick<
  LogEvent,
  "section" | "level" | "timestamp" | "body" | "description" | "error" | "stack" | "indentation"
>

export const LEVEL_NAME_WIDTH = 5

const ESC = "\u001B"
const RESET = `${ESC}[0m`
// eslint-disable-next-line no-control-regex
const SGR_SEQUENCE = /\u001B\[[0-9]+m/g

/**
 * Renders an event as colored text:
 *
 * ```text
 * [2024-01-15 12:30:00 +0200] Warn : svc: body
 *                             |> description
 *                             |- error
 *                             |- stack
 * ```
 */
export function renderColored(event: RenderableEvent): string {
  const time = formatTimestamp(event.timestamp)
  const color = sgr(event.level.ansiColor)

  let text = `${RESET}[${time}] ${color}${centerLevelName(event.level.name)}: ${event.section}: ${event.body}${RESET}`

  const separator = event.indentation ? `\n${" ".repeat(time.length + 3)}|` : "\n|"

  if (event.description !== undefined && event.description.length > 0) {
    text += `${separator}> ${event.description.replaceAll("\n", `${separator}  `)}`
  }

  if (event.error !== undefined && event.error !== null) {
    const errorText = toDisplayString(event.error)
    if (errorText.length > 0) {
      text += coloredBlock(errorText, color, separator)
    }
  }

  if (event.stack) {
    const stackText = renderStack(event.stack)
    if (stackText.length > 0) {
      text += coloredBlock(stackText, color, separator)
    }
  }

  return text
}

/** {@link renderColored} without its color codes. */
export function renderPlain(event: RenderableEvent): string {
  return stripAnsi(renderColored(event))
}

export function stripAnsi(text: string): string {
  return text.replace(SGR_SEQUENCE, "")
}

/**
 * Terse rendering of a stack. The application-frame predicate keeps every
 * frame; only runtime frames are collapsed.
 */
export function renderStack(stack: Trace): string {
  return stack
    .foldFrames(() => false, { terse: true })
    .toString()
    .trim()
}

/** Centers `name` within the level column; odd padding goes to the right. */
export function centerLevelName(name: string, width: number = LEVEL_NAME_WIDTH): string {
  if (name.length >= width) return name

  const total = width - name.length
  const left = Math.floor(total / 2)

  return " ".repeat(left) + name + " ".repeat(total - left)
}

function coloredBlock(text: string, color: string, separator: string): string {
  const lines = text.trim().replaceAll("\n", `${RESET}${separator}  ${color}`)

  return `${separator}- ${color}${lines}${RESET}`
}

function sgr(code: number): string {
  return `${ESC}[${code}m`
}
