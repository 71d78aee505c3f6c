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

/** Interface that all ledger adapters must implement. */
export interface ReceiptLedger {
  /** Establish a connection to the database. */
  connect(): Promise<void>

  /** Create the receipt, outcome and cooldown tables if they do not already exist. */
  createTables(): Promise<void>

  /**
   * Insert a receipt, or on redelivery of the same id increment `attempt_count`
   * and take the incoming status. A receipt that is already `processed` stays
   * `processed` so the caller can recognise a replay of completed work.
   */
  upsertReceipt(input: ReceiptInput): Promise<UpsertReceiptResult>

  /** Overwrite status, summary and last error. Last writer wins. */
  markStatus(deliveryId: string, status: ReceiptStatus, options?: MarkStatusOptions): Promise<void>

  /** Insert an outcome, or overwrite `result`/`meta` of the same (delivery, action, target). */
  recordAction(outcome: ActionOutcomeInput): Promise<void>

  /** Receipts, most recently received first. */
  listReceipts(options?: ListReceiptsOptions): Promise<EventReceipt[]>

  getReceipt(deliveryId: string): Promise<EventReceipt | null>

  /** Outcomes of one delivery in the order they were first recorded. */
  listActions(deliveryId: string): Promise<ActionOutcome[]>

  /** Epoch ms of the last confirmed reminder notification for (task, mode), if any. */
  getLastReminderNotifyMs(taskId: string, mode: string): Promise<number | null>

  recordReminderNotify(taskId: string, mode: string, sentAtMs: number): Promise<void>

  /** Close the database connection and release resources. */
  close(): Promise<void>
}
