// Types
export type {
  ActionOutcome,
  ActionResult,
  DatabaseConfig,
  DatabaseType,
  EventReceipt,
  JsonObject,
  ReceiptStatus,
  ReminderConfig,
  RuleName,
  TodoistWebhookEvent,
  WorkerConfig,
} from './types.js'

// Configuration and errors
export { buildConfig, loadConfig } from './config.js'
export type { ConfigSource } from './config.js'
export { ConfigError, TaskApiError } from './errors.js'

// Ledger adapters
export type { ReceiptLedger } from './adapters/base.js'
export { createLedger } from './adapters/index.js'
export { PostgresLedger } from './adapters/postgres.js'
export { MysqlLedger } from './adapters/mysql.js'
export { SqliteLedger } from './adapters/sqlite.js'

// Webhook verification and parsing
export { verifyTodoistSignature } from './webhook-verifier.js'
export { decodeEnvelope, parseEvent } from './event-parser.js'

// Task API
export { TodoistClient } from './task-client.js'
export type { TaskClient, TodoistComment, TodoistTask } from './task-client.js'

// Rules and policy
export { createDefaultRules } from './rules/index.js'
export type { Action, Rule, RuleContext, RulePlan } from './rules/index.js'
export { evaluateFocusPolicy } from './policy.js'
export type { PolicyDecision, PolicyEvaluator, PolicyInput, TaskContext } from './policy.js'

// Pipeline and server
export { processDelivery } from './pipeline.js'
export type { DeliveryRequest, DeliveryResponse, PipelineDeps } from './pipeline.js'
export { createWorkerServer } from './server.js'
export type { RulesWorkerServer } from './server.js'
