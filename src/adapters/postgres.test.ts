import { beforeEach, describe, expect, it, vi } from 'vitest'
import { PostgresLedger } from './postgres.js'

const pool = vi.hoisted(() => ({
  query: vi.fn(),
  connect: vi.fn(),
  end: vi.fn(),
  release: vi.fn(),
  connectionStrings: new Array<string>(),
}))

vi.mock('pg', () => ({
  default: {
    Pool: class {
      query = pool.query
      connect = pool.connect
      end = pool.end

      constructor(options: { connectionString: string }) {
        pool.connectionStrings.push(options.connectionString)
      }
    },
  },
}))

const storedRow = {
  delivery_id: 'd1',
  // BIGINT arrives as a string
  received_at_ms: '1000',
  event_name: 'item:completed',
  user_id: 'u1',
  triggered_at: null,
  entity_type: 'task',
  entity_id: 't1',
  project_id: 'p1',
  status: 'processed',
  attempt_count: 2,
  last_error: null,
  // JSONB arrives decoded
  summary_json: { rules_triggered: 1 },
  payload_hash: 'abc123',
}

describe('PostgresLedger', () => {
  let ledger: PostgresLedger

  beforeEach(async () => {
    vi.clearAllMocks()
    pool.connect.mockResolvedValue({ release: pool.release })
    pool.query.mockResolvedValue({ rows: [] })
    pool.end.mockResolvedValue(undefined)
    ledger = new PostgresLedger('postgres://localhost/rules')
    await ledger.connect()
  })

  it('checks out and releases a client on connect', () => {
    expect(pool.connectionStrings).toContain('postgres://localhost/rules')
    expect(pool.release).toHaveBeenCalledTimes(1)
  })

  it('creates the three tables', async () => {
    await ledger.createTables()
    const statements = pool.query.mock.calls.map((call) => String(call[0]))
    expect(statements.some((sql) => sql.includes('CREATE TABLE IF NOT EXISTS event_receipts'))).toBe(true)
    expect(statements.some((sql) => sql.includes('CREATE TABLE IF NOT EXISTS action_outcomes'))).toBe(true)
    expect(statements.some((sql) => sql.includes('CREATE TABLE IF NOT EXISTS reminder_notifications'))).toBe(
      true,
    )
  })

  it('upserts with a sticky processed status and maps the returned row', async () => {
    pool.query.mockResolvedValueOnce({ rows: [storedRow] })

    const { isNew, receipt } = await ledger.upsertReceipt({
      delivery_id: 'd1',
      event_name: 'item:completed',
      user_id: 'u1',
      triggered_at: null,
      entity_type: 'task',
      entity_id: 't1',
      project_id: 'p1',
      status: 'received',
      payload_hash: 'abc123',
    })

    const [sql, params] = pool.query.mock.calls[0]
    expect(sql).toContain("CASE WHEN event_receipts.status = 'processed'")
    expect(sql).toContain('RETURNING *')
    expect(params[0]).toBe('d1')
    expect(params[8]).toBe('received')

    expect(isNew).toBe(false)
    expect(receipt.received_at.getTime()).toBe(1000)
    expect(receipt.status).toBe('processed')
    expect(receipt.summary).toEqual({ rules_triggered: 1 })
  })

  it('clamps list paging', async () => {
    await ledger.listReceipts({ limit: 5000, offset: -3 })
    expect(pool.query).toHaveBeenLastCalledWith(expect.stringContaining('LIMIT $1 OFFSET $2'), [1000, 0])
  })

  it('reads the cooldown timestamp as a number', async () => {
    pool.query.mockResolvedValueOnce({ rows: [{ last_sent_at_ms: '9000' }] })
    expect(await ledger.getLastReminderNotifyMs('t1', 'REMINDER_FOLLOW_UP')).toBe(9000)
    expect(await ledger.getLastReminderNotifyMs('t2', 'REMINDER_FOLLOW_UP')).toBeNull()
  })

  it('ends the pool on close and refuses further use', async () => {
    await ledger.close()
    expect(pool.end).toHaveBeenCalledTimes(1)
    await expect(ledger.getReceipt('d1')).rejects.toThrow('not connected')
  })
})
