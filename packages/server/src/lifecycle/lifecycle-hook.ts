import type { Milliseconds } from "@respire/clock"

export interface LifecycleHookContext {
  /** Aborts when the phase deadline passes. */
  signal: AbortSignal
  timeRemainingMs: Milliseconds
}

export interface LifecycleHook {
  name: string
  fn: (ctx: LifecycleHookContext) => Promise<void>
}

export interface HookFailure {
  hook: string
  error: unknown
}

/** Outcome of a startup or shutdown phase. */
export type PhaseResult = {
  /** No failures and no timeout. */
  ok: boolean
  failures: HookFailure[]
  /** The deadline passed before every hook had run. */
  timedOut: boolean
}
