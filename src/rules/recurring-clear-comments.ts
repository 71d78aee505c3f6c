import type { TodoistWebhookEvent } from '../types.js'
import {
  applyCap,
  isCompletionEvent,
  type DeleteCommentAction,
  type Rule,
  type RuleContext,
  type RulePlan,
} from './base.js'

/**
 * When a recurring task is completed, delete its comments so the next
 * occurrence starts clean. Comments starting with a keep marker survive.
 */
export class RecurringClearCommentsRule implements Rule {
  readonly name = 'recurring_clear_comments_on_completion' as const

  matches(event: TodoistWebhookEvent): boolean {
    return isCompletionEvent(event)
  }

  async plan(ctx: RuleContext, event: TodoistWebhookEvent): Promise<RulePlan> {
    const taskId = event.task_id
    if (taskId === null) {
      return { actions: [], meta: { reason: 'missing_task_id' } }
    }

    const task = await ctx.tasks.getTask(taskId)
    if (!task.due?.is_recurring) {
      return { actions: [], meta: { reason: 'not_recurring', task_id: taskId } }
    }

    const comments = await ctx.tasks.listCommentsForTask(taskId)
    const keepMarkers = ctx.config.keepMarkers.map((marker) => marker.toLowerCase())

    const planned: DeleteCommentAction[] = []
    let kept = 0
    for (const comment of comments) {
      const content = comment.content.trim().toLowerCase()
      if (keepMarkers.some((marker) => content.startsWith(marker))) {
        kept++
        continue
      }
      planned.push({
        action_type: 'delete_comment',
        target_type: 'comment',
        target_id: comment.id,
        meta: { task_id: taskId },
      })
    }

    const { actions, capHit } = applyCap(planned, ctx.config.maxDeleteComments)
    return {
      actions,
      meta: {
        task_id: taskId,
        is_recurring: true,
        kept_count: kept,
        delete_count: actions.length,
        cap_hit: capHit,
        dry_run: ctx.config.dryRun,
      },
    }
  }
}
