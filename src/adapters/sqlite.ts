import type { Database } from 'better-sqlite3'
import type { ReceiptLedger } from './base.js'
import { isRecord } from '../json.js'
import type {
  ActionOutcome,
  ActionOutcomeInput,
  EventReceipt,
  ListReceiptsOptions,
  MarkStatusOptions,
  ReceiptInput,
  ReceiptStatus,
  UpsertReceiptResult,
} from '../types.js'
import { pageOf, rowToOutcome, rowToReceipt } from './rows.js'

/** How long a writer waits on a locked database before failing, in milliseconds. */
const BUSY_TIMEOUT_MS = 5000

/**
 * SQLite ledger using the `better-sqlite3` module.
 * The driver is imported on connect, so it is only loaded when SQLite is the configured database.
 */
export class SqliteLedger implements ReceiptLedger {
  private db: Database | null = null
  private readonly filePath: string

  constructor(filePath: string) {
    this.filePath = filePath
  }

  async connect(): Promise<void> {
    const { default: BetterSqlite3 } = await import('better-sqlite3')
    this.db = new BetterSqlite3(this.filePath, { timeout: BUSY_TIMEOUT_MS })

    // WAL lets admin reads proceed while a delivery is writing
    this.db.pragma('journal_mode = WAL')
    this.db.pragma(`busy_timeout = ${BUSY_TIMEOUT_MS}`)
  }

  async createTables(): Promise<void> {
    const db = this.connection()

    db.exec(`
      CREATE TABLE IF NOT EXISTS event_receipts (
        delivery_id TEXT PRIMARY KEY,
        received_at_ms INTEGER NOT NULL,
        event_name TEXT NOT NULL,
        user_id TEXT,
        triggered_at TEXT,
        entity_type TEXT NOT NULL,
        entity_id TEXT,
        project_id TEXT,
        status TEXT NOT NULL,
        attempt_count INTEGER NOT NULL DEFAULT 1,
        last_error TEXT,
        summary_json TEXT NOT NULL DEFAULT '{}',
        payload_hash TEXT
      )
    `)

    db.exec(`
      CREATE INDEX IF NOT EXISTS idx_event_receipts_received_at
        ON event_receipts (received_at_ms DESC)
    `)

    db.exec(`
      CREATE TABLE IF NOT EXISTS action_outcomes (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        delivery_id TEXT NOT NULL,
        rule_name TEXT NOT NULL,
        action_type TEXT NOT NULL,
        target_type TEXT NOT NULL,
        target_id TEXT NOT NULL,
        result TEXT NOT NULL,
        meta_json TEXT NOT NULL DEFAULT '{}',
        UNIQUE (delivery_id, action_type, target_id)
      )
    `)

    db.exec(`
      CREATE TABLE IF NOT EXISTS reminder_notifications (
        task_id TEXT NOT NULL,
        mode TEXT NOT NULL,
        last_sent_at_ms INTEGER NOT NULL,
        PRIMARY KEY (task_id, mode)
      )
    `)
  }

  async upsertReceipt(input: ReceiptInput): Promise<UpsertReceiptResult> {
    const db = this.connection()

    const row: unknown = db
      .prepare(
        `INSERT INTO event_receipts (
           delivery_id, received_at_ms, event_name, user_id, triggered_at,
           entity_type, entity_id, project_id, status, payload_hash
         ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
         ON CONFLICT (delivery_id) DO UPDATE SET
           attempt_count = attempt_count + 1,
           status = CASE WHEN status = 'processed' THEN status ELSE excluded.status END
         RETURNING *`,
      )
      .get(
        input.delivery_id,
        Date.now(),
        input.event_name,
        input.user_id,
        input.triggered_at,
        input.entity_type,
        input.entity_id,
        input.project_id,
        input.status,
        input.payload_hash,
      )

    if (!isRecord(row)) {
      throw new Error(`Failed to read back receipt ${input.delivery_id}`)
    }

    const receipt = rowToReceipt(row)
    return { isNew: receipt.attempt_count === 1, receipt }
  }

  async markStatus(
    deliveryId: string,
    status: ReceiptStatus,
    options?: MarkStatusOptions,
  ): Promise<void> {
    this.connection()
      .prepare(
        `UPDATE event_receipts
         SET status = ?, summary_json = ?, last_error = ?
         WHERE delivery_id = ?`,
      )
      .run(status, JSON.stringify(options?.summary ?? {}), options?.error ?? null, deliveryId)
  }

  async recordAction(outcome: ActionOutcomeInput): Promise<void> {
    this.connection()
      .prepare(
        `INSERT INTO action_outcomes (
           delivery_id, rule_name, action_type, target_type, target_id, result, meta_json
         ) VALUES (?, ?, ?, ?, ?, ?, ?)
         ON CONFLICT (delivery_id, action_type, target_id) DO UPDATE SET
           result = excluded.result,
           meta_json = excluded.meta_json`,
      )
      .run(
        outcome.delivery_id,
        outcome.rule_name,
        outcome.action_type,
        outcome.target_type,
        outcome.target_id,
        outcome.result,
        JSON.stringify(outcome.meta),
      )
  }

  async listReceipts(options?: ListReceiptsOptions): Promise<EventReceipt[]> {
    const { limit, offset } = pageOf(options)
    const rows = this.connection()
      .prepare(
        `SELECT * FROM event_receipts
         ORDER BY received_at_ms DESC
         LIMIT ? OFFSET ?`,
      )
      .all(limit, offset)

    return rows.filter(isRecord).map(rowToReceipt)
  }

  async getReceipt(deliveryId: string): Promise<EventReceipt | null> {
    const row: unknown = this.connection()
      .prepare('SELECT * FROM event_receipts WHERE delivery_id = ?')
      .get(deliveryId)

    return isRecord(row) ? rowToReceipt(row) : null
  }

  async listActions(deliveryId: string): Promise<ActionOutcome[]> {
    const rows = this.connection()
      .prepare('SELECT * FROM action_outcomes WHERE delivery_id = ? ORDER BY id ASC')
      .all(deliveryId)

    return rows.filter(isRecord).map(rowToOutcome)
  }

  async getLastReminderNotifyMs(taskId: string, mode: string): Promise<number | null> {
    const row: unknown = this.connection()
      .prepare('SELECT last_sent_at_ms FROM reminder_notifications WHERE task_id = ? AND mode = ?')
      .get(taskId, mode)

    return isRecord(row) ? Number(row.last_sent_at_ms) : null
  }

  async recordReminderNotify(taskId: string, mode: string, sentAtMs: number): Promise<void> {
    this.connection()
      .prepare(
        `INSERT INTO reminder_notifications (task_id, mode, last_sent_at_ms)
         VALUES (?, ?, ?)
         ON CONFLICT (task_id, mode) DO UPDATE SET last_sent_at_ms = excluded.last_sent_at_ms`,
      )
      .run(taskId, mode, sentAtMs)
  }

  async close(): Promise<void> {
    if (this.db) {
      this.db.close()
      this.db = null
    }
  }

  private connection(): Database {
    if (!this.db) {
      throw new Error('SQLite ledger is not connected. Call connect() first.')
    }
    return this.db
  }
}
