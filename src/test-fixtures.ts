import { createHmac } from 'node:crypto'
import { SqliteLedger } from './adapters/sqlite.js'
import { loadConfig } from './config.js'
import { TaskApiError } from './errors.js'
import type { TaskClient, TodoistComment, TodoistTask } from './task-client.js'
import type { JsonObject, TodoistWebhookEvent, WorkerConfig } from './types.js'

export const TEST_SECRET = 'test-secret'

export function makeConfig(overrides: Partial<WorkerConfig> = {}): WorkerConfig {
  return {
    ...loadConfig({ TODOIST_API_KEY: 'test-token', TODOIST_CLIENT_SECRET: TEST_SECRET }),
    ...overrides,
  }
}

export const makeTask = (overrides: Partial<TodoistTask> = {}): TodoistTask => ({
  id: overrides.id ?? 't1',
  content: overrides.content ?? 'Water the plants',
  project_id: overrides.project_id === undefined ? 'p1' : overrides.project_id,
  parent_id: overrides.parent_id ?? null,
  labels: overrides.labels ?? [],
  due: overrides.due === undefined
    ? { date: '2026-03-02', datetime: null, is_recurring: true, string: 'every day' }
    : overrides.due,
  url: overrides.url ?? null,
})

export const makeEvent = (overrides: Partial<TodoistWebhookEvent> = {}): TodoistWebhookEvent => ({
  delivery_id: overrides.delivery_id ?? 'd1',
  event_name: overrides.event_name ?? 'item:completed',
  user_id: overrides.user_id ?? 'u1',
  triggered_at: overrides.triggered_at ?? '2026-03-02T15:00:00Z',
  task_id: overrides.task_id === undefined ? 't1' : overrides.task_id,
  project_id: overrides.project_id === undefined ? 'p1' : overrides.project_id,
  update_intent: overrides.update_intent ?? null,
  reminder_id: overrides.reminder_id ?? null,
  raw: overrides.raw ?? {},
})

/** In-memory {@link TaskClient} that records every side effect. */
export class FakeTaskClient implements TaskClient {
  readonly tasks = new Map<string, TodoistTask>()
  readonly comments = new Map<string, TodoistComment[]>()
  readonly deletedComments: string[] = []
  readonly deletedTasks: string[] = []
  readonly posts: { url: string; payload: JsonObject; bearerToken: string | null }[] = []
  webhookStatus = 200
  /** Comment ids whose deletion fails with a 500. */
  readonly failingComments = new Set<string>()

  addTask(task: TodoistTask): this {
    this.tasks.set(task.id, task)
    return this
  }

  async getTask(taskId: string): Promise<TodoistTask> {
    const task = this.tasks.get(taskId)
    if (!task) {
      throw new TaskApiError(`GET /tasks/${taskId} failed with status 404`, `/tasks/${taskId}`, 404)
    }
    return task
  }

  async listCommentsForTask(taskId: string): Promise<TodoistComment[]> {
    return this.comments.get(taskId) ?? []
  }

  async listActiveTasksForProject(projectId: string): Promise<TodoistTask[]> {
    return [...this.tasks.values()].filter((task) => task.project_id === projectId)
  }

  async listAllActiveTasks(): Promise<TodoistTask[]> {
    return [...this.tasks.values()]
  }

  async deleteComment(commentId: string): Promise<void> {
    if (this.failingComments.has(commentId)) {
      throw new TaskApiError(
        `DELETE /comments/${commentId} failed with status 500`,
        `/comments/${commentId}`,
        500,
      )
    }
    this.deletedComments.push(commentId)
  }

  async deleteTask(taskId: string): Promise<void> {
    this.deletedTasks.push(taskId)
    this.tasks.delete(taskId)
  }

  async postWebhook(url: string, payload: JsonObject, bearerToken?: string | null): Promise<number> {
    this.posts.push({ url, payload, bearerToken: bearerToken ?? null })
    return this.webhookStatus
  }
}

/** Base64 HMAC-SHA256 of `body`, as the sender puts in `x-todoist-hmac-sha256`. */
export function signBody(body: string | Buffer, secret: string = TEST_SECRET): string {
  return createHmac('sha256', secret).update(body).digest('base64')
}

export async function openMemoryLedger(): Promise<SqliteLedger> {
  const ledger = new SqliteLedger(':memory:')
  await ledger.connect()
  await ledger.createTables()
  return ledger
}
