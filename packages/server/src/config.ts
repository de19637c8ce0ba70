import { type ConfigSource, DotenvSource, EnvSource, type IConfig, loadConfig } from "@respire/config"
import type { Sleeper } from "@respire/clock"
import type { LockedMemoryStoreOptions } from "@respire/kv"
import { logLevelNames } from "@respire/logger"
import { z } from "zod"
import type { ServerOptions } from "./server-options"

export const ENV_PREFIX = "RESPIRE_"

export const serverConfigSchema = z.object({
  PORT: z.coerce.number().int().min(0).max(65_535).default(6379),
  HOST: z.string().min(1).default("127.0.0.1"),
  LOG_LEVEL: z.enum(logLevelNames).default("info"),
  LOG_PRETTY: z.stringbool().default(false),
  MAX_FRAME_BYTES: z.coerce.number().int().positive().default(512 * 1024 * 1024),
  SHUTDOWN_TIMEOUT_MS: z.coerce.number().int().nonnegative().default(10_000),
  /** Unset means a command waits for the store lock indefinitely. */
  LOCK_TIMEOUT_MS: z.coerce.number().int().positive().optional(),
})

export type ServerConfig = z.infer<typeof serverConfigSchema>

/** `.env` in the working directory if present, then the process environment. */
export function defaultConfigSources(env?: Record<string, string | undefined>): ConfigSource[] {
  return [
    new DotenvSource({ file: ".env", required: false, prefix: ENV_PREFIX }),
    new EnvSource({ prefix: ENV_PREFIX, ...(env && { env }) }),
  ]
}

export function loadServerConfig(
  sources: ConfigSource[] = defaultConfigSources(),
): Promise<IConfig<ServerConfig>> {
  return loadConfig({ schema: serverConfigSchema, sources })
}

export function toServerOptions(config: ServerConfig): ServerOptions {
  return {
    port: config.PORT,
    host: config.HOST,
    maxFrameBytes: config.MAX_FRAME_BYTES,
    shutdownTimeoutMs: config.SHUTDOWN_TIMEOUT_MS,
  }
}

export function toStoreOptions(config: ServerConfig, clock: Sleeper): LockedMemoryStoreOptions {
  return config.LOCK_TIMEOUT_MS === undefined
    ? { clock }
    : { clock, lockTimeoutMs: config.LOCK_TIMEOUT_MS }
}
