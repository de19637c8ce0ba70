import type { Clock, Milliseconds } from "@respire/clock"
import type { SharedBytes } from "@respire/codec"
import type { KeyValueStore } from "@respire/kv"
import type { Logger } from "@respire/logger"
import { DEFAULT_REPLY_MAPPINGS, type ReplyMappingsConfig } from "./errors/reply-formatter"
import type { LifecycleHook } from "./lifecycle/lifecycle-hook"

export interface ServerDependencies {
  logger: Logger
  clock: Clock
  store: KeyValueStore<SharedBytes>
}

export interface ServerOptions {
  /** 0 binds a free port; read the real one from `ServerHandle.address`. */
  port: number

  /**
   * Host to bind to.
   * @default "127.0.0.1"
   */
  host?: string

  /**
   * Largest request frame a connection buffers before it is dropped.
   * @default 536_870_912 (512 MiB)
   */
  maxFrameBytes?: number

  /**
   * Timeout for start hooks in milliseconds.
   * @default 2_147_483_647 (max timer value, effectively no timeout)
   */
  startupTimeoutMs?: Milliseconds

  /**
   * Timeout for graceful shutdown in milliseconds.
   * @default 10_000
   */
  shutdownTimeoutMs?: Milliseconds

  /** Error code to reply text. Defaults cover the command errors. */
  replies?: ReplyMappingsConfig

  /** Run before the listener binds; the first failure aborts the start. */
  startHooks?: LifecycleHook[]

  /** Run after connections and the listener have closed. */
  stopHooks?: LifecycleHook[]
}

export type ResolvedServerOptions = {
  port: number
  host: string
  maxFrameBytes: number
  startupTimeoutMs: Milliseconds
  shutdownTimeoutMs: Milliseconds
  replies: ReplyMappingsConfig
  startHooks: readonly LifecycleHook[]
  stopHooks: readonly LifecycleHook[]
}

const MAX_TIMER_MS: Milliseconds = 2_147_483_647

interface ServerDefaults {
  host: string
  maxFrameBytes: number
  startupTimeoutMs: Milliseconds
  shutdownTimeoutMs: Milliseconds
}

export const DEFAULTS: ServerDefaults = {
  host: "127.0.0.1",
  maxFrameBytes: 512 * 1024 * 1024,
  startupTimeoutMs: MAX_TIMER_MS,
  shutdownTimeoutMs: 10_000,
}

export function resolveOptions(options: ServerOptions): ResolvedServerOptions {
  return {
    port: options.port,
    host: options.host ?? DEFAULTS.host,
    maxFrameBytes: options.maxFrameBytes ?? DEFAULTS.maxFrameBytes,
    startupTimeoutMs: clampTimer(options.startupTimeoutMs ?? DEFAULTS.startupTimeoutMs),
    shutdownTimeoutMs: clampTimer(options.shutdownTimeoutMs ?? DEFAULTS.shutdownTimeoutMs),
    replies: options.replies ?? DEFAULT_REPLY_MAPPINGS,
    startHooks: options.startHooks ?? [],
    stopHooks: options.stopHooks ?? [],
  }
}

// setTimeout fires at once for delays above MAX_TIMER_MS
function clampTimer(ms: Milliseconds): Milliseconds {
  return Math.min(Math.max(0, ms), MAX_TIMER_MS)
}
