export function assertValidTimeMs(value: number, name: string): void {
  if (!Number.isFinite(value) || value < 0) {
    throw new Error(`${name} must be a finite, non-negative number, got: ${value}`)
  }
}

export function assertPositiveTimeMs(value: number, name: string): void {
  if (!Number.isFinite(value) || value <= 0) {
    throw new Error(`${name} must be a finite, positive number, got: ${value}`)
  }
}
