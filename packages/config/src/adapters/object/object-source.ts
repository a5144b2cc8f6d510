import type { ConfigSource } from "../../ports/source"

/** In-code settings, typically last in the list to override everything else. */
export class ObjectSource implements ConfigSource {
  constructor(
    private readonly obj: Record<string, unknown>,
    readonly name: string = "object:overrides",
  ) {}

  async load(): Promise<Record<string, unknown>> {
    return { ...this.obj }
  }
}
