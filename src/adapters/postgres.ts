import type { Pool } from 'pg'
import type { ReceiptLedger } from './base.js'
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

/**
 * PostgreSQL ledger using the `pg` module.
 * The driver is imported on connect, so it is only loaded when PostgreSQL is the configured database.
 */
export class PostgresLedger implements ReceiptLedger {
  private pool: Pool | null = null
  private readonly connectionString: string

  constructor(connectionString: string) {
    this.connectionString = connectionString
  }

  async connect(): Promise<void> {
    const { default: pg } = await import('pg')
    this.pool = new pg.Pool({ connectionString: this.connectionString })

    // Verify the connection works
    const client = await this.pool.connect()
    client.release()
  }

  async createTables(): Promise<void> {
    const pool = this.connection()

    await pool.query(`
      CREATE TABLE IF NOT EXISTS event_receipts (
        delivery_id TEXT PRIMARY KEY,
        received_at_ms BIGINT NOT NULL,
        event_name TEXT NOT NULL,
        user_id TEXT,
        triggered_at TEXT,
        entity_type TEXT NOT NULL,
        entity_id TEXT,
        project_id TEXT,
        status TEXT NOT NULL,
        attempt_count INTEGER NOT NULL DEFAULT 1,
        last_error TEXT,
        summary_json JSONB NOT NULL DEFAULT '{}',
        payload_hash TEXT
      )
    `)

    await pool.query(`
      CREATE INDEX IF NOT EXISTS idx_event_receipts_received_at
        ON event_receipts (received_at_ms DESC)
    `)

    await pool.query(`
      CREATE TABLE IF NOT EXISTS action_outcomes (
        id BIGSERIAL PRIMARY KEY,
        delivery_id TEXT NOT NULL,
        rule_name TEXT NOT NULL,
        action_type TEXT NOT NULL,
        target_type TEXT NOT NULL,
        target_id TEXT NOT NULL,
        result TEXT NOT NULL,
        meta_json JSONB NOT NULL DEFAULT '{}',
        UNIQUE (delivery_id, action_type, target_id)
      )
    `)

    await pool.query(`
      CREATE TABLE IF NOT EXISTS reminder_notifications (
        task_id TEXT NOT NULL,
        mode TEXT NOT NULL,
        last_sent_at_ms BIGINT NOT NULL,
        PRIMARY KEY (task_id, mode)
      )
    `)
  }

  async upsertReceipt(input: ReceiptInput): Promise<UpsertReceiptResult> {
    const result = await this.connection().query(
      `INSERT INTO event_receipts (
         delivery_id, received_at_ms, event_name, user_id, triggered_at,
         entity_type, entity_id, project_id, status, payload_hash
       ) VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10)
       ON CONFLICT (delivery_id) DO UPDATE SET
         attempt_count = event_receipts.attempt_count + 1,
         status = CASE WHEN event_receipts.status = 'processed'
                       THEN event_receipts.status ELSE EXCLUDED.status END
       RETURNING *`,
      [
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
      ],
    )

    const row = result.rows[0]
    if (!row) {
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
    await this.connection().query(
      `UPDATE event_receipts
       SET status = $1, summary_json = $2, last_error = $3
       WHERE delivery_id = $4`,
      [status, JSON.stringify(options?.summary ?? {}), options?.error ?? null, deliveryId],
    )
  }

  async recordAction(outcome: ActionOutcomeInput): Promise<void> {
    await this.connection().query(
      `INSERT INTO action_outcomes (
         delivery_id, rule_name, action_type, target_type, target_id, result, meta_json
       ) VALUES ($1, $2, $3, $4, $5, $6, $7)
       ON CONFLICT (delivery_id, action_type, target_id) DO UPDATE SET
         result = EXCLUDED.result,
         meta_json = EXCLUDED.meta_json`,
      [
        outcome.delivery_id,
        outcome.rule_name,
        outcome.action_type,
        outcome.target_type,
        outcome.target_id,
        outcome.result,
        JSON.stringify(outcome.meta),
      ],
    )
  }

  async listReceipts(options?: ListReceiptsOptions): Promise<EventReceipt[]> {
    const { limit, offset } = pageOf(options)
    const result = await this.connection().query(
      `SELECT * FROM event_receipts
       ORDER BY received_at_ms DESC
       LIMIT $1 OFFSET $2`,
      [limit, offset],
    )
    return result.rows.map(rowToReceipt)
  }

  async getReceipt(deliveryId: string): Promise<EventReceipt | null> {
    const result = await this.connection().query(
      'SELECT * FROM event_receipts WHERE delivery_id = $1',
      [deliveryId],
    )
    const row = result.rows[0]
    return row ? rowToReceipt(row) : null
  }

  async listActions(deliveryId: string): Promise<ActionOutcome[]> {
    const result = await this.connection().query(
      'SELECT * FROM action_outcomes WHERE delivery_id = $1 ORDER BY id ASC',
      [deliveryId],
    )
    return result.rows.map(rowToOutcome)
  }

  async getLastReminderNotifyMs(taskId: string, mode: string): Promise<number | null> {
    const result = await this.connection().query(
      'SELECT last_sent_at_ms FROM reminder_notifications WHERE task_id = $1 AND mode = $2',
      [taskId, mode],
    )
    const row = result.rows[0]
    return row ? Number(row.last_sent_at_ms) : null
  }

  async recordReminderNotify(taskId: string, mode: string, sentAtMs: number): Promise<void> {
    await this.connection().query(
      `INSERT INTO reminder_notifications (task_id, mode, last_sent_at_ms)
       VALUES ($1, $2, $3)
       ON CONFLICT (task_id, mode) DO UPDATE SET last_sent_at_ms = EXCLUDED.last_sent_at_ms`,
      [taskId, mode, sentAtMs],
    )
  }

  async close(): Promise<void> {
    if (this.pool) {
      await this.pool.end()
      this.pool = null
    }
  }

  private connection(): Pool {
    if (!this.pool) {
      throw new Error('PostgreSQL ledger is not connected. Call connect() first.')
    }
    return this.pool
  }
}
