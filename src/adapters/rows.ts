import { parseJsonObject } from '../json.js'
import type {
  ActionOutcome,
  ActionResult,
  EventReceipt,
  ListReceiptsOptions,
  ReceiptStatus,
} from '../types.js'

const RECEIPT_STATUSES: readonly ReceiptStatus[] = [
  'received',
  'rejected_signature',
  'bad_request',
  'processing',
  'processed',
  'error',
  'ignored_disabled',
  'ignored_allowlist',
]

const ACTION_RESULTS: readonly ActionResult[] = ['success', 'skipped', 'failed']

type Row = Record<string, unknown>

function text(row: Row, key: string): string {
  const value = row[key]
  if (typeof value === 'string') return value
  if (typeof value === 'number' || typeof value === 'bigint') return String(value)
  throw new Error(`Ledger row is missing column "${key}"`)
}

function optionalText(row: Row, key: string): string | null {
  const value = row[key]
  return value === null || value === undefined ? null : text(row, key)
}

/** Integer column; pg returns BIGINT as a string. */
function integer(row: Row, key: string): number {
  const value = Number(row[key])
  if (!Number.isFinite(value)) {
    throw new Error(`Ledger row has a non-numeric "${key}"`)
  }
  return value
}

function toStatus(value: string): ReceiptStatus {
  const status = RECEIPT_STATUSES.find((s) => s === value)
  if (!status) {
    throw new Error(`Unknown receipt status "${value}"`)
  }
  return status
}

function toResult(value: string): ActionResult {
  const result = ACTION_RESULTS.find((r) => r === value)
  if (!result) {
    throw new Error(`Unknown action result "${value}"`)
  }
  return result
}

export function rowToReceipt(row: Row): EventReceipt {
  return {
    delivery_id: text(row, 'delivery_id'),
    received_at: new Date(integer(row, 'received_at_ms')),
    event_name: text(row, 'event_name'),
    user_id: optionalText(row, 'user_id'),
    triggered_at: optionalText(row, 'triggered_at'),
    entity_type: text(row, 'entity_type'),
    entity_id: optionalText(row, 'entity_id'),
    project_id: optionalText(row, 'project_id'),
    status: toStatus(text(row, 'status')),
    attempt_count: integer(row, 'attempt_count'),
    last_error: optionalText(row, 'last_error'),
    summary: parseJsonObject(row.summary_json),
    payload_hash: optionalText(row, 'payload_hash'),
  }
}

export function rowToOutcome(row: Row): ActionOutcome {
  return {
    id: integer(row, 'id'),
    delivery_id: text(row, 'delivery_id'),
    rule_name: text(row, 'rule_name'),
    action_type: text(row, 'action_type'),
    target_type: text(row, 'target_type'),
    target_id: text(row, 'target_id'),
    result: toResult(text(row, 'result')),
    meta: parseJsonObject(row.meta_json),
  }
}

export const MAX_LIST_LIMIT = 1000

/** Clamp list options to `limit` in [1, 1000] (default 100) and `offset` >= 0. */
export function pageOf(options?: ListReceiptsOptions): { limit: number; offset: number } {
  const limit = Math.min(Math.max(Math.trunc(options?.limit ?? 100), 1), MAX_LIST_LIMIT)
  const offset = Math.max(Math.trunc(options?.offset ?? 0), 0)
  return { limit, offset }
}
