import type { JsonValue } from '../types.js'

export type SafeJsonParseResult<T = unknown> =
  | { ok: true; value: T }
  | { ok: false; error: string }

export function safeJsonParse(input: string): SafeJsonParseResult {
  try {
    const value: unknown = JSON.parse(input)
    return { ok: true, value }
  } catch (error) {
    return {
      ok: false,
      error: error instanceof Error ? error.message : 'Invalid JSON',
    }
  }
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function splitPath(path: string): string[] {
  return path.split('.').filter(segment => segment.length > 0)
}

/**
 * Resolve a dotted path (`pageProps.products.items`, `nodes.0.id`).
 * Returns undefined as soon as a segment is missing.
 */
export function getPath(value: unknown, path: string): unknown {
  let current: unknown = value
  for (const segment of splitPath(path)) {
    if (Array.isArray(current)) {
      const index = Number(segment)
      if (!Number.isInteger(index)) return undefined
      current = current[index]
    } else if (isRecord(current)) {
      current = current[segment]
    } else {
      return undefined
    }
  }
  return current
}

/**
 * Copy of `target` with `path` set to `value`; intermediate objects are
 * created as needed.
 */
export function setPath(target: JsonValue, path: string, value: JsonValue): JsonValue {
  const [head, ...rest] = splitPath(path)
  if (head === undefined) return value
  const base: { [key: string]: JsonValue } = isJsonObject(target) ? { ...target } : {}
  const child = base[head] ?? {}
  base[head] = rest.length === 0 ? value : setPath(child, rest.join('.'), value)
  return base
}

function isJsonObject(value: JsonValue): value is { [key: string]: JsonValue } {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

/** Scalars print as text; objects, arrays, null and undefined give undefined */
export function scalarToString(value: unknown): string | undefined {
  if (typeof value === 'string') return value
  if (typeof value === 'number') return Number.isFinite(value) ? String(value) : undefined
  if (typeof value === 'boolean') return value ? 'true' : 'false'
  return undefined
}
