import type { JsonObject } from './types.js'

export function isRecord(value: unknown): value is JsonObject {
  return value !== null && typeof value === 'object' && !Array.isArray(value)
}

/** A string field, or `null` when absent or not a string. */
export function readString(obj: JsonObject, key: string): string | null {
  const value = obj[key]
  return typeof value === 'string' ? value : null
}

/**
 * An identifier field. Todoist sends ids as strings but older payloads use numbers,
 * so both are accepted and normalized to a string. Blank strings count as absent.
 */
export function readId(obj: JsonObject, key: string): string | null {
  const value = obj[key]
  if (typeof value === 'number' && Number.isFinite(value)) {
    return String(value)
  }
  if (typeof value === 'string' && value.trim() !== '') {
    return value.trim()
  }
  return null
}

export function readRecord(obj: JsonObject, key: string): JsonObject {
  const value = obj[key]
  return isRecord(value) ? value : {}
}

/** Parse a JSON column that may already be decoded by the driver (pg JSONB, mysql2 JSON). */
export function parseJsonObject(value: unknown): JsonObject {
  if (isRecord(value)) {
    return value
  }
  if (typeof value === 'string' && value !== '') {
    const parsed: unknown = JSON.parse(value)
    return isRecord(parsed) ? parsed : {}
  }
  return {}
}
