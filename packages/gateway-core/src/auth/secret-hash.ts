import { createHash, randomBytes, timingSafeEqual } from 'node:crypto'

export function hashSecret(raw: string): string {
  return createHash('sha256').update(raw).digest('hex')
}

export function generateSecret(): string {
  return randomBytes(32).toString('hex')
}

/** Constant-time comparison of two SHA-256 hex digests. */
export function hashesEqual(a: string, b: string): boolean {
  const left = Buffer.from(a, 'hex')
  const right = Buffer.from(b, 'hex')
  if (left.length !== 32 || right.length !== 32) {
    // Still spend one comparison so a malformed stored hash is not observable.
    timingSafeEqual(left.length === 32 ? left : Buffer.alloc(32), Buffer.alloc(32))
    return false
  }
  return timingSafeEqual(left, right)
}
