import type { Pool, RowDataPacket } from 'mysql2/promise'
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
 * MySQL ledger using the `mysql2` module.
 * The driver is imported on connect, so it is only loaded when MySQL is the configured database.
 */
export class MysqlLedger implements ReceiptLedger {
  private pool: Pool | null = null
  private readonly connectionString: string

  constructor(connectionString: string) {
    this.connectionString = connectionString
  }

  async connect(): Promise<void> {
    const { default: mysql } = await import('mysql2/promise')
    this.pool = mysql.createPool({ uri: this.connectionString })

    // Verify the connection works
    const connection = await this.pool.getConnection()
    connection.release()
  }

  async createTables(): Promise<void> {
    const pool = this.connection()

    await pool.execute(`
      CREATE TABLE IF NOT EXISTS event_receipts (
        delivery_id VARCHAR(255) PRIMARY KEY,
        received_at_ms BIGINT NOT NULL,
        event_name VARCHAR(255) NOT NULL,
        user_id VARCHAR(255) NULL,
        triggered_at VARCHAR(64) NULL,
        entity_type VARCHAR(64) NOT NULL,
        entity_id VARCHAR(255) NULL,
        project_id VARCHAR(255) NULL,
        status VARCHAR(32) NOT NULL,
        attempt_count INT NOT NULL DEFAULT 1,
        last_error TEXT NULL,
        summary_json JSON NOT NULL,
        payload_hash CHAR(64) NULL,
        INDEX idx_event_receipts_received_at (received_at_ms)
      ) ENGINE=InnoDB DEFAULT CHARSET=utf8mb4 COLLATE=utf8mb4_unicode_ci
    `)

    await pool.execute(`
      CREATE TABLE IF NOT EXISTS action_outcomes (
        id BIGINT AUTO_INCREMENT PRIMARY KEY,
        delivery_id VARCHAR(255) NOT NULL,
        rule_name VARCHAR(128) NOT NULL,
        action_type VARCHAR(64) NOT NULL,
        target_type VARCHAR(64) NOT NULL,
        target_id VARCHAR(255) NOT NULL,
        result VARCHAR(16) NOT NULL,
        meta_json JSON NOT NULL,
        UNIQUE KEY unique_outcome (delivery_id, action_type, target_id)
      ) ENGINE=InnoDB DEFAULT CHARSET=utf8mb4 COLLATE=utf8mb4_unicode_ci
    `)

    await pool.execute(`
      CREATE TABLE IF NOT EXISTS reminder_notifications (
        task_id VARCHAR(255) NOT NULL,
        mode VARCHAR(64) NOT NULL,
        last_sent_at_ms BIGINT NOT NULL,
        PRIMARY KEY (task_id, mode)
      ) ENGINE=InnoDB DEFAULT CHARSET=utf8mb4 COLLATE=utf8mb4_unicode_ci
    `)
  }

  async upsertReceipt(input: ReceiptInput): Promise<UpsertReceiptResult> {
    const pool = this.connection()

    // Assignments run left to right; status must read the stored value.
    await pool.execute(
      `INSERT INTO event_receipts (
         delivery_id, received_at_ms, event_name, user_id, triggered_at,
         entity_type, entity_id, project_id, status, summary_json, payload_hash
       ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, '{}', ?)
       ON DUPLICATE KEY UPDATE
         status = IF(status = 'processed', status, VALUES(status)),
         attempt_count = attempt_count + 1`,
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

    const receipt = await this.getReceipt(input.delivery_id)
    if (!receipt) {
      throw new Error(`Failed to read back receipt ${input.delivery_id}`)
    }
    return { isNew: receipt.attempt_count === 1, receipt }
  }

  async markStatus(
    deliveryId: string,
    status: ReceiptStatus,
    options?: MarkStatusOptions,
  ): Promise<void> {
    await this.connection().execute(
      `UPDATE event_receipts
       SET status = ?, summary_json = ?, last_error = ?
       WHERE delivery_id = ?`,
      [status, JSON.stringify(options?.summary ?? {}), options?.error ?? null, deliveryId],
    )
  }

  async recordAction(outcome: ActionOutcomeInput): Promise<void> {
    await this.connection().execute(
      `INSERT INTO action_outcomes (
         delivery_id, rule_name, action_type, target_type, target_id, result, meta_json
       ) VALUES (?, ?, ?, ?, ?, ?, ?)
       ON DUPLICATE KEY UPDATE
         result = VALUES(result),
         meta_json = VALUES(meta_json)`,
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
    // LIMIT/OFFSET as strings: mysqld rejects numeric placeholders there under execute()
    const [rows] = await this.connection().execute<RowDataPacket[]>(
      `SELECT * FROM event_receipts
       ORDER BY received_at_ms DESC
       LIMIT ? OFFSET ?`,
      [String(limit), String(offset)],
    )
    return rows.map(rowToReceipt)
  }

  async getReceipt(deliveryId: string): Promise<EventReceipt | null> {
    const [rows] = await this.connection().execute<RowDataPacket[]>(
      'SELECT * FROM event_receipts WHERE delivery_id = ?',
      [deliveryId],
    )
    const row = rows[0]
    return row ? rowToReceipt(row) : null
  }

  async listActions(deliveryId: string): Promise<ActionOutcome[]> {
    const [rows] = await this.connection().execute<RowDataPacket[]>(
      'SELECT * FROM action_outcomes WHERE delivery_id = ? ORDER BY id ASC',
      [deliveryId],
    )
    return rows.map(rowToOutcome)
  }

  async getLastReminderNotifyMs(taskId: string, mode: string): Promise<number | null> {
    const [rows] = await this.connection().execute<RowDataPacket[]>(
      'SELECT last_sent_at_ms FROM reminder_notifications WHERE task_id = ? AND mode = ?',
      [taskId, mode],
    )
    const row = rows[0]
    return row ? Number(row.last_sent_at_ms) : null
  }

  async recordReminderNotify(taskId: string, mode: string, sentAtMs: number): Promise<void> {
    await this.connection().execute(
      `INSERT INTO reminder_notifications (task_id, mode, last_sent_at_ms)
       VALUES (?, ?, ?)
       ON DUPLICATE KEY UPDATE last_sent_at_ms = VALUES(last_sent_at_ms)`,
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
      throw new Error('MySQL ledger is not connected. Call connect() first.')
    }
    return this.pool
  }
}
