import type { TodoistTask } from '../task-client.js'
import type { TodoistWebhookEvent } from '../types.js'
import {
  applyCap,
  isCompletionEvent,
  type DeleteTaskAction,
  type Rule,
  type RuleContext,
  type RulePlan,
} from './base.js'

function childrenByParent(tasks: TodoistTask[]): Map<string, string[]> {
  const byParent = new Map<string, string[]>()
  for (const task of tasks) {
    if (!task.id || !task.parent_id) continue
    const siblings = byParent.get(task.parent_id)
    if (siblings) {
      siblings.push(task.id)
    } else {
      byParent.set(task.parent_id, [task.id])
    }
  }
  return byParent
}

/** Every descendant of `rootId` in discovery order, excluding the root. Cycle-safe. */
export function collectDescendants(rootId: string, byParent: Map<string, string[]>): string[] {
  const descendants: string[] = []
  const seen = new Set<string>()
  const stack = [rootId]

  while (stack.length > 0) {
    const current = stack.pop()
    if (current === undefined) break
    for (const child of byParent.get(current) ?? []) {
      if (child === rootId || seen.has(child)) continue
      seen.add(child)
      descendants.push(child)
      stack.push(child)
    }
  }

  return descendants
}

/**
 * When a recurring task is completed, delete all of its subtasks (at any depth)
 * so the next occurrence starts without them.
 */
export class RecurringPurgeSubtasksRule implements Rule {
  readonly name = 'recurring_purge_subtasks_on_completion' as const

  matches(event: TodoistWebhookEvent): boolean {
    return isCompletionEvent(event)
  }

  async plan(ctx: RuleContext, event: TodoistWebhookEvent): Promise<RulePlan> {
    const taskId = event.task_id
    if (taskId === null) {
      return { actions: [], meta: { reason: 'missing_task_id' } }
    }
    if (!event.project_id) {
      return { actions: [], meta: { reason: 'missing_project_id', task_id: taskId } }
    }

    const parent = await ctx.tasks.getTask(taskId)
    if (!parent.due?.is_recurring) {
      return { actions: [], meta: { reason: 'not_recurring', task_id: taskId } }
    }

    const tasks = await ctx.tasks.listActiveTasksForProject(event.project_id)
    const descendants = collectDescendants(taskId, childrenByParent(tasks))

    // Leaves before their ancestors, so nothing depends on the API's cascade.
    const planned = [...descendants].reverse().map(
      (id): DeleteTaskAction => ({
        action_type: 'delete_task',
        target_type: 'task',
        target_id: id,
        meta: { parent_task_id: taskId },
      }),
    )

    const { actions, capHit } = applyCap(planned, ctx.config.maxDeleteSubtasks)
    return {
      actions,
      meta: {
        task_id: taskId,
        is_recurring: true,
        subtasks_found: descendants.length,
        delete_count: actions.length,
        cap_hit: capHit,
        dry_run: ctx.config.dryRun,
      },
    }
  }
}
