import type { ConfigSource } from "../../ports/source"

export class ObjectSource implements ConfigSource {
  readonly name = "object:overrides"

  constructor(private readonly obj: Record<string, unknown>) {}

  load(): Record<string, unknown> {
    return { ...this.obj }
  }
}
