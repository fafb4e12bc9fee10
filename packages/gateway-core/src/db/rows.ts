import type { QueryRow } from './client'

/**
 * Column readers for pg rows. A column of the wrong shape is a schema drift
 * bug, so they throw instead of coercing.
 */

function fail(row: QueryRow, key: string, expected: string): never {
  throw new TypeError(`Column ${key} is not ${expected} (got ${typeof row[key]})`)
}

export function text(row: QueryRow, key: string): string {
  const v = row[key]
  return typeof v === 'string' ? v : fail(row, key, 'text')
}

export function nullableText(row: QueryRow, key: string): string | null {
  const v = row[key]
  if (v === null || v === undefined) return null
  return typeof v === 'string' ? v : fail(row, key, 'text')
}

/** pg returns bigint and numeric as strings. */
export function int(row: QueryRow, key: string): number {
  const v = row[key]
  if (typeof v === 'number') return v
  if (typeof v === 'string' && /^-?\d+$/.test(v)) return Number(v)
  return fail(row, key, 'an integer')
}

export function timestamp(row: QueryRow, key: string): string {
  const v = row[key]
  if (v instanceof Date) return v.toISOString()
  return typeof v === 'string' ? v : fail(row, key, 'a timestamp')
}

export function nullableTimestamp(row: QueryRow, key: string): string | null {
  const v = row[key]
  return v === null || v === undefined ? null : timestamp(row, key)
}

export function textArray(row: QueryRow, key: string): string[] {
  const v = row[key]
  if (v === null || v === undefined) return []
  if (Array.isArray(v) && v.every((x): x is string => typeof x === 'string')) return v
  return fail(row, key, 'text[]')
}

/** jsonb column; pg parses it, but a text column holding JSON is accepted too. */
export function json(row: QueryRow, key: string): unknown {
  const v = row[key]
  return typeof v === 'string' ? JSON.parse(v) : v
}
