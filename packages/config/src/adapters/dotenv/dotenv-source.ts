import fs from "node:fs/promises"
import path from "node:path"
import { parse } from "dotenv"
import { stripPrefix } from "../../core/prefix"
import type { ConfigSource } from "../../ports/source"

export type DotenvSourceOptions = {
  /**
   * Path to the .env file, absolute or relative to `cwd`.
   *
   * @example ".env", ".env.local"
   */
  file: string

  /**
   * `true` throws when the file is missing; `false` yields an empty config.
   */
  required: boolean

  /** Same meaning as `EnvSourceOptions.prefix`, so one file can serve both. */
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

      return stripPrefix(parse(content), this.opts.prefix)
    } catch (err) {
      if (!this.opts.required && isNotFound(err)) return {}

      throw err
    }
  }
}

function isNotFound(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT"
}
