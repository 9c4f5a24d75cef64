import fs from "node:fs/promises"
import path from "node:path"
import { parse } from "dotenv"
import type { ConfigSource } from "../../ports/config-source"
import { stripPrefix } from "./strip-prefix"

export type DotenvSourceOptions = {
  /**
   * Path to the .env file, absolute or relative to `cwd`.
   *
   * @example ".env", ".env.local"
   */
  file: string

  /** Throw when the file is missing instead of contributing nothing. */
  required: boolean

  /** Only variables starting with this prefix are kept, with the prefix removed. */
  prefix?: string

  /** @default process.cwd() */
  cwd?: string
}

export class DotenvSource implements ConfigSource {
  readonly name: string

  constructor(private readonly opts: DotenvSourceOptions) {
    this.name = `dotenv:${opts.file}`
  }

  async load(): Promise<Record<string, string | undefined>> {
    const cwd = this.opts.cwd ?? process.cwd()
    const filePath = path.resolve(cwd, this.opts.file)

    let content: string
    try {
      content = await fs.readFile(filePath, "utf-8")
    } catch (err) {
      if (!this.opts.required && isNotFound(err)) {
        return {}
      }
      throw err
    }

    return stripPrefix(parse(content), this.opts.prefix)
  }
}

function isNotFound(err: unknown): boolean {
  return typeof err === "object" && err !== null && "code" in err && err.code === "ENOENT"
}
