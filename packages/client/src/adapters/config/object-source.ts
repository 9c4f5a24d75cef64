import type { ConfigSource } from "../../ports/config-source"

export class ObjectSource implements ConfigSource {
  readonly name = "object:overrides"

  constructor(private readonly obj: Record<string, string | undefined>) {}

  async load(): Promise<Record<string, string | undefined>> {
    return { ...this.obj }
  }
}
