import type { LogHandler } from "../../ports/handler"
import type { LogEvent } from "../../ports/log-event"

/** Keeps every event it receives; useful for tests and in-app log views. */
export class MemoryHandler implements LogHandler {
  private readonly received: LogEvent[] = []
  private wasDisposed = false

  get events(): readonly LogEvent[] {
    return [...this.received]
  }

  /** Plain renderings of {@link events}. */
  get messages(): string[] {
    return this.received.map((e) => e.generatedMessage)
  }

  get disposed(): boolean {
    return this.wasDisposed
  }

  handle(event: LogEvent): void {
    this.received.push(event)
  }

  clear(): void {
    this.received.length = 0
  }

  dispose(): void {
    this.wasDisposed = true
  }
}
