import type { LocalTime } from './local-time.js'

export const FOCUS_LABEL = 'focus'

export const MODE_SKIP = 'SKIP'
export const MODE_ACTIVE_FOCUS_EXECUTION = 'ACTIVE_FOCUS_EXECUTION'
export const MODE_ACTIVE_FOCUS_PREP_WINDOW = 'ACTIVE_FOCUS_PREP_WINDOW'
export const MODE_REMINDER_FOLLOW_UP = 'REMINDER_FOLLOW_UP'

/** A task as the notification policy sees it. */
export interface TaskContext {
  id: string
  content: string
  /** Lower-cased, trimmed, de-duplicated. */
  labels: string[]
  projectId: string | null
  /** `YYYY-MM-DD`, or `null` when absent or malformed. */
  dueDate: string | null
  dueDatetime: Date | null
  url: string | null
}

export interface PolicyConfig {
  requireFocusForReminder: boolean
  /** First local hour (inclusive) in which notifications may go out. */
  allowedHourStart: number
  /** Local hour (exclusive) at which the window closes. 24 means end of day. */
  allowedHourEnd: number
}

export interface PolicyInput {
  source: 'reminder'
  now: LocalTime
  reminderTask: TaskContext | null
  config: PolicyConfig
}

export interface PolicyDecision {
  shouldNotify: boolean
  mode: string
  reason: string
  focusTaskId: string | null
  candidateTaskIds: string[]
}

/** Decides whether and how to notify. Must be pure. */
export type PolicyEvaluator = (input: PolicyInput) => PolicyDecision

function skip(reason: string): PolicyDecision {
  return { shouldNotify: false, mode: MODE_SKIP, reason, focusTaskId: null, candidateTaskIds: [] }
}

/** Default focus policy for fired reminders. */
export const evaluateFocusPolicy: PolicyEvaluator = (input) => {
  const { now, reminderTask, config } = input

  if (now.hour < config.allowedHourStart || now.hour >= config.allowedHourEnd) {
    return skip('outside_allowed_hours')
  }
  if (!reminderTask) {
    return skip('missing_reminder_task')
  }

  const hasFocus = reminderTask.labels.includes(FOCUS_LABEL)
  if (config.requireFocusForReminder && !hasFocus) {
    return skip('reminder_task_not_focus')
  }

  if (hasFocus) {
    return {
      shouldNotify: true,
      mode: MODE_ACTIVE_FOCUS_EXECUTION,
      reason: 'reminder_focus_task',
      focusTaskId: reminderTask.id,
      candidateTaskIds: [reminderTask.id],
    }
  }
  return {
    shouldNotify: true,
    mode: MODE_REMINDER_FOLLOW_UP,
    reason: 'reminder_fired',
    focusTaskId: null,
    candidateTaskIds: [reminderTask.id],
  }
}
