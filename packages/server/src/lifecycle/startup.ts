import type { Clock, UnixMs } from "@respire/clock"
import type { Logger } from "@respire/logger"
import type { LifecycleHook, PhaseResult } from "./lifecycle-hook"
import { runHooks } from "./run-hooks"

export type StartupContext = {
  clock: Clock
  logger: Logger
  deadlineMs: UnixMs
  startHooks: readonly LifecycleHook[]
}

export async function startup(ctx: StartupContext): Promise<PhaseResult> {
  ctx.logger.debug("Running startup hooks...")

  const { failures, timedOut } = await runHooks(
    { phase: "startup", clock: ctx.clock, logger: ctx.logger, deadlineMs: ctx.deadlineMs },
    ctx.startHooks,
    { failFast: true },
  )

  return { ok: failures.length === 0 && !timedOut, failures, timedOut }
}

export type StartupFn = typeof startup
