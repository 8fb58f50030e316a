import fs from "node:fs/promises"
import path from "node:path"
import { isNotFoundError } from "@scrapekit/errors"
import { parse } from "dotenv"
import type { ConfigSource } from "../../ports/config-source"
import { stripPrefix } from "./prefix"

export type DotenvSourceOptions = {
  /**
   * Path to the .env file, absolute or relative to `cwd`.
   *
   * @example ".env", ".env.local"
   */
  file: string

  /** When `false`, a missing file loads as empty. */
  required: boolean

  /** Only variables with this prefix are loaded, without it. */
  prefix?: string

  /** @default process.cwd() */
  cwd?: string
}

export class DotenvSource implements ConfigSource {
  readonly name: string

  constructor(private readonly opts: DotenvSourceOptions) {
    this.name = `dotenv:${opts.file}`
  }

  async load(): Promise<Record<string, unknown>> {
    const filePath = path.resolve(this.opts.cwd ?? process.cwd(), this.opts.file)

    try {
      const content = await fs.readFile(filePath, "utf-8")
      return stripPrefix(parse(content), this.opts.prefix ?? "")
    } catch (err) {
      if (!this.opts.required && isNotFoundError(err)) return {}
      throw err
    }
  }
}
