import type { ReceiptLedger } from '../adapters/base.js'
import type { PolicyEvaluator } from '../policy.js'
import type { TaskClient } from '../task-client.js'
import type { JsonObject, RuleName, TodoistWebhookEvent, WorkerConfig } from '../types.js'

export interface DeleteCommentAction {
  action_type: 'delete_comment'
  target_type: 'comment'
  target_id: string
  meta: { task_id: string }
}

export interface DeleteTaskAction {
  action_type: 'delete_task'
  target_type: 'task'
  target_id: string
  meta: { parent_task_id: string }
}

export interface NotifyWebhookAction {
  action_type: 'notify_webhook'
  target_type: 'webhook'
  /** The hook URL. */
  target_id: string
  meta: {
    task_id: string
    event_name: string
    policy_mode: string
    message_mode: string
    cooldown_minutes: number
    payload: JsonObject
  }
}

/** A planned side effect. Rules produce these; only the executor performs them. */
export type Action = DeleteCommentAction | DeleteTaskAction | NotifyWebhookAction

export interface RulePlan {
  actions: Action[]
  /** Outcome metadata merged into the receipt summary. Carries `reason` when nothing is planned. */
  meta: JsonObject
}

/** Read-only collaborators handed to every rule invocation. */
export interface RuleContext {
  readonly config: WorkerConfig
  readonly ledger: ReceiptLedger
  readonly tasks: TaskClient
  readonly policy: PolicyEvaluator
  readonly now: () => Date
}

export interface Rule {
  readonly name: RuleName
  /** Side-effect free, no I/O. */
  matches(event: TodoistWebhookEvent): boolean
  /** May read through `ctx.tasks` and `ctx.ledger`; never performs the side effect. */
  plan(ctx: RuleContext, event: TodoistWebhookEvent): Promise<RulePlan>
}

/** Keep at most `cap` actions. */
export function applyCap<T>(actions: T[], cap: number): { actions: T[]; capHit: boolean } {
  if (actions.length > cap) {
    return { actions: actions.slice(0, cap), capHit: true }
  }
  return { actions, capHit: false }
}

/** `item:completed`, or `item:updated` whose intent is a completion, with a task id. */
export function isCompletionEvent(event: TodoistWebhookEvent): boolean {
  if (event.task_id === null) {
    return false
  }
  if (event.event_name === 'item:completed') {
    return true
  }
  return event.event_name === 'item:updated' && event.update_intent === 'item_completed'
}
