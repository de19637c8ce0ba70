import { BaseError, ErrorCodes } from "@respire/errors"
import { type ZodType, z } from "zod"
import { EnvSource } from "../adapters/env/env-source"
import type { IConfig } from "../ports/config"
import type { ConfigSource } from "../ports/source"
import { Config } from "./config"

export type LoadConfigOptions<T extends Record<string, unknown>> = {
  schema: ZodType<T>
  sources?: ConfigSource[]
}

type Issue = { readonly path: readonly PropertyKey[]; readonly message: string }

export class ConfigValidationError extends BaseError<typeof ErrorCodes.InvalidConfig> {
  constructor(details: string, issues: readonly Issue[]) {
    super(`Configuration validation failed:\n${details}`, {
      code: ErrorCodes.InvalidConfig,
      context: {
        issues: issues.map((i) => ({ path: i.path.map(String).join("."), message: i.message })),
      },
    })
  }
}

export async function loadConfig<T extends Record<string, unknown>>({
  schema,
  sources,
}: LoadConfigOptions<T>): Promise<IConfig<T>> {
  const merged: Record<string, unknown> = {}
  const provenance: Record<string, string> = {}

  for (const source of sources ?? [new EnvSource()]) {
    const values = await source.load()

    for (const [key, value] of Object.entries(values)) {
      if (value === undefined) continue

      merged[key] = value
      provenance[key] = source.name
    }
  }

  const result = schema.safeParse(merged)

  if (!result.success) {
    throw new ConfigValidationError(z.prettifyError(result.error), result.error.issues)
  }

  for (const key of Object.keys(result.data)) {
    if (!(key in provenance)) provenance[key] = "default"
  }

  return new Config<T>(result.data, provenance, new Set(Object.keys(merged)))
}
