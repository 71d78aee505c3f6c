import { createHash } from 'node:crypto'
import type { ReceiptLedger } from './adapters/base.js'
import { decodeEnvelope, parseEvent } from './event-parser.js'
import type { PolicyEvaluator } from './policy.js'
import type { Action, Rule, RuleContext } from './rules/base.js'
import type { TaskClient } from './task-client.js'
import type { JsonObject, ReceiptInput, ReceiptStatus, TodoistWebhookEvent, WorkerConfig } from './types.js'
import { verifyTodoistSignature } from './webhook-verifier.js'

/** Everything a delivery needs, built once at startup. */
export interface PipelineDeps {
  config: WorkerConfig
  ledger: ReceiptLedger
  tasks: TaskClient
  policy: PolicyEvaluator
  rules: readonly Rule[]
  now?: () => Date
}

export interface DeliveryRequest {
  rawBody: Buffer
  /** `x-todoist-hmac-sha256` header. */
  signature: string | undefined
  /** `x-todoist-delivery-id` header. */
  deliveryId: string | undefined
}

export interface DeliveryResponse {
  statusCode: number
  body: JsonObject
}

function unknownReceipt(deliveryId: string, status: ReceiptStatus, payloadHash: string): ReceiptInput {
  return {
    delivery_id: deliveryId,
    event_name: 'unknown',
    user_id: null,
    triggered_at: null,
    entity_type: 'unknown',
    entity_id: null,
    project_id: null,
    status,
    payload_hash: payloadHash,
  }
}

/** The allow/deny gate that rejects this event, or `null` when it may proceed. */
function gateFor(
  config: WorkerConfig,
  event: TodoistWebhookEvent,
): { status: ReceiptStatus; summary: JsonObject } | null {
  if (!config.enabled) {
    return { status: 'ignored_disabled', summary: { enabled: false } }
  }
  if (config.allowedUserIds.length > 0 && !(event.user_id && config.allowedUserIds.includes(event.user_id))) {
    return { status: 'ignored_allowlist', summary: { reason: 'user_id' } }
  }
  if (event.project_id && config.deniedProjectIds.includes(event.project_id)) {
    return { status: 'ignored_allowlist', summary: { reason: 'denied_project' } }
  }
  if (
    config.allowedProjectIds.length > 0 &&
    !(event.project_id && config.allowedProjectIds.includes(event.project_id))
  ) {
    return { status: 'ignored_allowlist', summary: { reason: 'project_id' } }
  }
  return null
}

/**
 * Perform one planned action against the remote system.
 * Returns extra outcome metadata. Failures propagate.
 */
async function executeAction(ctx: RuleContext, action: Action): Promise<JsonObject> {
  switch (action.action_type) {
    case 'delete_comment':
      await ctx.tasks.deleteComment(action.target_id)
      return {}
    case 'delete_task':
      await ctx.tasks.deleteTask(action.target_id)
      return {}
    case 'notify_webhook': {
      const status = await ctx.tasks.postWebhook(
        action.target_id,
        action.meta.payload,
        ctx.config.reminder.webhookToken,
      )
      // Cooldown only advances on a confirmed send.
      await ctx.ledger.recordReminderNotify(
        action.meta.task_id,
        action.meta.policy_mode,
        ctx.now().getTime(),
      )
      return { webhook_status: status }
    }
  }
}

async function runRules(
  deps: PipelineDeps,
  ctx: RuleContext,
  event: TodoistWebhookEvent,
): Promise<JsonObject[]> {
  const { config, ledger } = deps
  const outcomes: JsonObject[] = []

  for (const rule of deps.rules) {
    if (!config.rules[rule.name] || !rule.matches(event)) {
      continue
    }

    const plan = await rule.plan(ctx, event)
    let executed = 0

    for (const action of plan.actions) {
      const outcome = {
        delivery_id: event.delivery_id,
        rule_name: rule.name,
        action_type: action.action_type,
        target_type: action.target_type,
        target_id: action.target_id,
      }

      if (config.dryRun) {
        await ledger.recordAction({
          ...outcome,
          result: 'skipped',
          meta: { ...action.meta, reason: 'dry_run' },
        })
        continue
      }

      const extra = await executeAction(ctx, action)
      executed++
      await ledger.recordAction({
        ...outcome,
        result: 'success',
        meta: { ...action.meta, ...extra },
      })
    }

    console.log(
      `[rules-worker] ${event.delivery_id}: ${rule.name} planned ${plan.actions.length}, executed ${executed}`,
    )
    outcomes.push({ rule: rule.name, ...plan.meta, executed })
  }

  return outcomes
}

/**
 * Run one webhook delivery through verify → dedup → gates → plan → execute → record.
 *
 * Ledger failures outside the rule stage propagate to the caller. Failures while
 * planning or executing mark the receipt `error` and answer 500 so the sender
 * redelivers.
 */
export async function processDelivery(
  deps: PipelineDeps,
  request: DeliveryRequest,
): Promise<DeliveryResponse> {
  const { config, ledger } = deps
  const deliveryId = request.deliveryId?.trim()
  if (!deliveryId) {
    return { statusCode: 400, body: { ok: false, error: 'missing_delivery_id' } }
  }

  const payloadHash = createHash('sha256').update(request.rawBody).digest('hex')

  if (!verifyTodoistSignature(request.rawBody, request.signature, config.webhookSecret)) {
    console.warn(`[rules-worker] ${deliveryId}: invalid signature`)
    await ledger.upsertReceipt(unknownReceipt(deliveryId, 'rejected_signature', payloadHash))
    return { statusCode: 401, body: { ok: false, error: 'invalid_signature' } }
  }

  const envelope = decodeEnvelope(request.rawBody)
  if (!envelope) {
    await ledger.upsertReceipt(unknownReceipt(deliveryId, 'bad_request', payloadHash))
    return { statusCode: 400, body: { ok: false, error: 'invalid_json' } }
  }

  const event = parseEvent(envelope, deliveryId)
  if (!event.event_name) {
    return { statusCode: 400, body: { ok: false, error: 'missing_event_name' } }
  }

  const { isNew, receipt } = await ledger.upsertReceipt({
    delivery_id: deliveryId,
    event_name: event.event_name,
    user_id: event.user_id,
    triggered_at: event.triggered_at,
    entity_type: 'task',
    entity_id: event.task_id,
    project_id: event.project_id,
    status: 'received',
    payload_hash: payloadHash,
  })

  if (!isNew && receipt.status === 'processed') {
    console.log(
      `[rules-worker] ${deliveryId}: duplicate of processed delivery (attempt ${receipt.attempt_count})`,
    )
    return { statusCode: 200, body: { ok: true, delivery_id: deliveryId, duplicate: true } }
  }

  const gate = gateFor(config, event)
  if (gate) {
    await ledger.markStatus(deliveryId, gate.status, { summary: gate.summary })
    return { statusCode: 200, body: { ok: true, delivery_id: deliveryId, status: gate.status } }
  }

  const ctx: RuleContext = {
    config,
    ledger,
    tasks: deps.tasks,
    policy: deps.policy,
    now: deps.now ?? (() => new Date()),
  }

  try {
    await ledger.markStatus(deliveryId, 'processing')
    const outcomes = await runRules(deps, ctx, event)
    const summary: JsonObject =
      outcomes.length > 0
        ? { rules_triggered: outcomes.length, outcomes }
        : { rules_triggered: 0 }
    await ledger.markStatus(deliveryId, 'processed', { summary })
    return {
      statusCode: 200,
      body: { ok: true, delivery_id: deliveryId, duplicate: false, outcomes },
    }
  } catch (err) {
    console.error(`[rules-worker] ${deliveryId}: processing failed`, err)
    const message = err instanceof Error ? err.message : String(err)
    await ledger.markStatus(deliveryId, 'error', { error: message })
    return {
      statusCode: 500,
      body: { ok: false, delivery_id: deliveryId, error: 'transient_processing_failure' },
    }
  }
}
