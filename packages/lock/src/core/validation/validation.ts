export function assertValidTimeoutMs(value: number, name: string): void {
  if (Number.isNaN(value) || value < 0) {
    throw new RangeError(`${name} must be a non-negative number, got: ${value}`)
  }
}
