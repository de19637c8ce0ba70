import type { LockLease, LockMode } from "../../ports/lock-lease"

export type MemoryLeaseDeps = {
  onRelease: () => void
}

export class MemoryLease implements LockLease {
  public readonly mode: LockMode
  private readonly deps: MemoryLeaseDeps
  private isReleased = false

  public constructor(mode: LockMode, deps: MemoryLeaseDeps) {
    this.mode = mode
    this.deps = deps
  }

  public get released(): boolean {
    return this.isReleased
  }

  public async release(): Promise<void> {
    if (this.isReleased) return

    this.isReleased = true
    this.deps.onRelease()
  }
}
