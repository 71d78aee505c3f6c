import type { Rule } from './base.js'
import { RecurringClearCommentsRule } from './recurring-clear-comments.js'
import { RecurringPurgeSubtasksRule } from './recurring-purge-subtasks.js'
import { ReminderNotifyRule } from './reminder-notify.js'

/** The fixed rule list, in evaluation order. Feature flags decide which ones run. */
export function createDefaultRules(): Rule[] {
  return [new RecurringClearCommentsRule(), new RecurringPurgeSubtasksRule(), new ReminderNotifyRule()]
}

export type { Action, Rule, RuleContext, RulePlan } from './base.js'
export { RecurringClearCommentsRule } from './recurring-clear-comments.js'
export { RecurringPurgeSubtasksRule } from './recurring-purge-subtasks.js'
export { ReminderNotifyRule } from './reminder-notify.js'
