import { parseDueDate, parseDueDatetime, toLocalTime, type LocalTime } from '../local-time.js'
import { buildHookPayload, buildReminderMessage } from '../notification.js'
import { MODE_ACTIVE_FOCUS_PREP_WINDOW, FOCUS_LABEL, type TaskContext } from '../policy.js'
import type { TodoistTask } from '../task-client.js'
import type { TodoistWebhookEvent } from '../types.js'
import type { NotifyWebhookAction, Rule, RuleContext, RulePlan } from './base.js'

const HOOK_NAME = 'Focus Follow-up'
const MINUTE_MS = 60_000

export function toTaskContext(task: TodoistTask, timeZone: string): TaskContext {
  const labels = new Set(
    task.labels.map((label) => label.trim().toLowerCase()).filter((label) => label !== ''),
  )
  return {
    id: task.id,
    content: task.content.trim() || task.id,
    labels: [...labels],
    projectId: task.project_id,
    dueDate: parseDueDate(task.due?.date ?? null),
    dueDatetime: parseDueDatetime(task.due?.datetime ?? null, timeZone),
    url: task.url,
  }
}

/**
 * Message framing, separate from the policy decision: a reminder that fires
 * before the task is due is a prep nudge rather than an execution nudge.
 */
function messageModeFor(
  task: TaskContext,
  now: LocalTime,
  policy: { mode: string; reason: string },
): { mode: string; reason: string } {
  if (task.dueDatetime && task.dueDatetime.getTime() > now.instant.getTime()) {
    return { mode: MODE_ACTIVE_FOCUS_PREP_WINDOW, reason: 'reminder_before_due_datetime' }
  }
  if (task.dueDate && task.dueDate > now.date) {
    return { mode: MODE_ACTIVE_FOCUS_PREP_WINDOW, reason: 'reminder_before_due_date' }
  }
  return policy
}

/** Forward a fired Todoist reminder to a notification hook, subject to policy and cooldown. */
export class ReminderNotifyRule implements Rule {
  readonly name = 'reminder_notify' as const

  matches(event: TodoistWebhookEvent): boolean {
    return event.event_name === 'reminder:fired' && event.task_id !== null
  }

  async plan(ctx: RuleContext, event: TodoistWebhookEvent): Promise<RulePlan> {
    const taskId = event.task_id
    const { reminder } = ctx.config
    if (taskId === null) {
      return { actions: [], meta: { reason: 'missing_task_id' } }
    }
    if (!reminder.webhookUrl) {
      return { actions: [], meta: { reason: 'missing_webhook_url', task_id: taskId } }
    }
    if (!reminder.webhookToken) {
      return { actions: [], meta: { reason: 'missing_webhook_token', task_id: taskId } }
    }

    const task = await ctx.tasks.getTask(taskId)
    const taskContext = toTaskContext(task, reminder.timezone)
    const now = toLocalTime(ctx.now(), reminder.timezone)

    // The reminder path is not gated by the allowed-hours window.
    const decision = ctx.policy({
      source: 'reminder',
      now,
      reminderTask: taskContext,
      config: {
        requireFocusForReminder: reminder.requireFocusLabel,
        allowedHourStart: 0,
        allowedHourEnd: 24,
      },
    })
    if (!decision.shouldNotify) {
      return { actions: [], meta: { reason: decision.reason, task_id: taskId, mode: decision.mode } }
    }

    const cooldownMinutes = Math.max(0, reminder.cooldownMinutes)
    const cooldownMs = cooldownMinutes * MINUTE_MS
    const lastSentMs = await ctx.ledger.getLastReminderNotifyMs(taskId, decision.mode)
    const nowMs = now.instant.getTime()
    if (lastSentMs !== null && cooldownMs > 0 && nowMs - lastSentMs < cooldownMs) {
      return {
        actions: [],
        meta: {
          reason: 'cooldown_active',
          task_id: taskId,
          mode: decision.mode,
          cooldown_minutes: cooldownMinutes,
          last_sent_at_ms: lastSentMs,
        },
      }
    }

    const message = messageModeFor(taskContext, now, decision)
    const payload = buildHookPayload({
      message: buildReminderMessage(message.mode, taskContext, now),
      name: HOOK_NAME,
      channel: reminder.channel,
      to: reminder.to,
    })
    payload.meta = {
      source: 'todoist-rules-worker',
      event_name: event.event_name,
      task_id: taskId,
      project_id: event.project_id ?? task.project_id,
      reminder_id: event.reminder_id,
      triggered_at: event.triggered_at,
      policy_mode: decision.mode,
      policy_reason: decision.reason,
      message_mode: message.mode,
      message_reason: message.reason,
    }

    const action: NotifyWebhookAction = {
      action_type: 'notify_webhook',
      target_type: 'webhook',
      target_id: reminder.webhookUrl,
      meta: {
        task_id: taskId,
        event_name: event.event_name,
        policy_mode: decision.mode,
        message_mode: message.mode,
        cooldown_minutes: cooldownMinutes,
        payload,
      },
    }

    return {
      actions: [action],
      meta: {
        task_id: taskId,
        reminder_id: event.reminder_id,
        webhook_url_set: true,
        has_focus_label: taskContext.labels.includes(FOCUS_LABEL),
        policy_mode: decision.mode,
        policy_reason: decision.reason,
        message_mode: message.mode,
        message_reason: message.reason,
        cooldown_minutes: cooldownMinutes,
        dry_run: ctx.config.dryRun,
      },
    }
  }
}
