import type { Clock, Milliseconds, UnixMs } from "@respire/clock"
import type { Logger } from "@respire/logger"
import type { HookFailure, LifecycleHook } from "./lifecycle-hook"

export type HookPhase = "startup" | "shutdown"

export type RunHooksContext = {
  phase: HookPhase
  clock: Clock
  logger: Logger
  deadlineMs: UnixMs
}

export type RunHooksPolicy = {
  /** Stop at the first failure. Startup runs this way. */
  failFast?: boolean
}

export type RunHooksResult = { failures: HookFailure[]; timedOut: boolean }

type HookAttempt = { failure?: HookFailure; timedOut: boolean }

/**
 * Run `hooks` one after another against a shared deadline. Each hook gets a
 * signal that the clock aborts when the deadline passes; once it has passed,
 * the remaining hooks are skipped.
 */
export async function runHooks(
  ctx: RunHooksContext,
  hooks: readonly LifecycleHook[],
  policy: RunHooksPolicy = {},
): Promise<RunHooksResult> {
  const failures: HookFailure[] = []

  for (const hook of hooks) {
    const attempt = await runOneHook(ctx, hook)

    if (attempt.failure) {
      failures.push(attempt.failure)
      if (policy.failFast) return { failures, timedOut: attempt.timedOut }
    }

    if (attempt.timedOut) return { failures, timedOut: true }
  }

  return { failures, timedOut: false }
}

async function runOneHook(ctx: RunHooksContext, hook: LifecycleHook): Promise<HookAttempt> {
  const msLeft = timeLeftMs(ctx)

  if (msLeft <= 0) {
    ctx.logger.warn(`Skipping remaining ${ctx.phase} hooks due to timeout`)
    return { timedOut: true }
  }

  const deadline = new AbortController()
  const timer = armDeadline(ctx.clock, msLeft, deadline)

  try {
    await hook.fn({ signal: deadline.signal, timeRemainingMs: msLeft })

    if (pastDeadline(ctx, deadline)) {
      ctx.logger.warn(`${label(ctx.phase)} deadline exceeded during hook: ${hook.name}`)
      return { timedOut: true }
    }

    ctx.logger.info(`Executed ${ctx.phase} hook: ${hook.name}`)

    return { timedOut: false }
  } catch (err) {
    ctx.logger.error(`${label(ctx.phase)} hook failed: ${hook.name}`, { err })

    return { failure: { hook: hook.name, error: err }, timedOut: pastDeadline(ctx, deadline) }
  } finally {
    timer.abort()
  }
}

/** Abort `deadline` after `ms` on `clock`. Abort the returned controller to disarm. */
function armDeadline(clock: Clock, ms: Milliseconds, deadline: AbortController): AbortController {
  const timer = new AbortController()

  void clock.sleep(ms, timer.signal).then(() => {
    if (!timer.signal.aborted) deadline.abort()
  })

  return timer
}

function pastDeadline(ctx: RunHooksContext, deadline: AbortController): boolean {
  return deadline.signal.aborted || ctx.clock.nowMs() >= ctx.deadlineMs
}

function timeLeftMs(ctx: RunHooksContext): Milliseconds {
  return Math.max(0, ctx.deadlineMs - ctx.clock.nowMs())
}

function label(phase: HookPhase): string {
  return phase === "startup" ? "Startup" : "Shutdown"
}
