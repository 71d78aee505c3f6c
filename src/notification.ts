import { formatLocal, type LocalTime } from './local-time.js'
import {
  MODE_ACTIVE_FOCUS_EXECUTION,
  MODE_ACTIVE_FOCUS_PREP_WINDOW,
  type TaskContext,
} from './policy.js'
import type { JsonObject } from './types.js'

function dueLabel(task: TaskContext, now: LocalTime): string {
  if (task.dueDatetime) {
    return `at ${formatLocal(task.dueDatetime, now.timeZone)}`
  }
  if (task.dueDate) {
    return `on ${task.dueDate}`
  }
  return 'soon'
}

/** Text of a reminder nudge. The tone follows the message mode, not the policy mode. */
export function buildReminderMessage(mode: string, task: TaskContext, now: LocalTime): string {
  let text: string
  switch (mode) {
    case MODE_ACTIVE_FOCUS_PREP_WINDOW:
      text =
        `Heads up: "${task.content}" is due ${dueLabel(task, now)}. ` +
        'Use the time before then to prepare and decide the first step.'
      break
    case MODE_ACTIVE_FOCUS_EXECUTION:
      text = `Reminder for your focus task "${task.content}". Start on the next concrete step now.`
      break
    default:
      text = `Reminder: "${task.content}". Pick the next step or reschedule it.`
  }
  return task.url ? `${text}\n${task.url}` : text
}

export interface HookPayloadOptions {
  message: string
  name: string
  channel: string
  /** Recipient. Omitted from the payload when empty. */
  to: string | null
}

export function buildHookPayload(options: HookPayloadOptions): JsonObject {
  const payload: JsonObject = {
    message: options.message,
    name: options.name,
    channel: options.channel,
    deliver: true,
  }
  if (options.to) {
    payload.to = options.to
  }
  return payload
}
