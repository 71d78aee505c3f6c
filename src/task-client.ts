import { TaskApiError } from './errors.js'
import { isRecord, readId, readString } from './json.js'
import type { JsonObject } from './types.js'

const TODOIST_BASE_URL = 'https://api.todoist.com/api/v1'
const DEFAULT_TIMEOUT_MS = 10_000
/** Upper bound on cursor pages followed for a single list call. */
const MAX_PAGES = 50

export interface TodoistDue {
  /** `YYYY-MM-DD`, as sent. Not validated here. */
  date: string | null
  /** ISO datetime, with or without an offset. Not validated here. */
  datetime: string | null
  is_recurring: boolean
  string: string | null
}

export interface TodoistTask {
  id: string
  content: string
  project_id: string | null
  parent_id: string | null
  labels: string[]
  due: TodoistDue | null
  url: string | null
}

export interface TodoistComment {
  id: string
  content: string
}

/** The task-API capability the rules and the executor depend on. */
export interface TaskClient {
  getTask(taskId: string): Promise<TodoistTask>
  listCommentsForTask(taskId: string): Promise<TodoistComment[]>
  listActiveTasksForProject(projectId: string): Promise<TodoistTask[]>
  listAllActiveTasks(): Promise<TodoistTask[]>
  deleteComment(commentId: string): Promise<void>
  deleteTask(taskId: string): Promise<void>
  /** POST a JSON payload to a notification hook. Resolves with the HTTP status. */
  postWebhook(url: string, payload: JsonObject, bearerToken?: string | null): Promise<number>
}

function toDue(value: unknown): TodoistDue | null {
  if (!isRecord(value)) {
    return null
  }
  return {
    date: readString(value, 'date'),
    datetime: readString(value, 'datetime'),
    is_recurring: value.is_recurring === true,
    string: readString(value, 'string'),
  }
}

export function toTask(value: unknown): TodoistTask | null {
  if (!isRecord(value)) {
    return null
  }
  const id = readId(value, 'id')
  if (!id) {
    return null
  }
  const labels = Array.isArray(value.labels)
    ? value.labels.filter((label): label is string => typeof label === 'string')
    : []
  return {
    id,
    content: readString(value, 'content') ?? '',
    project_id: readId(value, 'project_id'),
    parent_id: readId(value, 'parent_id'),
    labels,
    due: toDue(value.due),
    url: readString(value, 'url'),
  }
}

function toComment(value: unknown): TodoistComment | null {
  if (!isRecord(value)) {
    return null
  }
  const id = readId(value, 'id')
  if (!id) {
    return null
  }
  return { id, content: readString(value, 'content') ?? '' }
}

function compact<T>(items: (T | null)[]): T[] {
  return items.filter((item): item is T => item !== null)
}

export interface TodoistClientOptions {
  apiToken: string
  timeoutMs?: number
  baseUrl?: string
}

/** {@link TaskClient} backed by the Todoist REST API (v1). */
export class TodoistClient implements TaskClient {
  private readonly apiToken: string
  private readonly timeoutMs: number
  private readonly baseUrl: string

  constructor(options: TodoistClientOptions) {
    this.apiToken = options.apiToken
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS
    this.baseUrl = (options.baseUrl ?? TODOIST_BASE_URL).replace(/\/+$/, '')
  }

  async getTask(taskId: string): Promise<TodoistTask> {
    const path = `/tasks/${encodeURIComponent(taskId)}`
    const task = toTask(await this.getJson(path))
    if (!task) {
      throw new TaskApiError(`Unexpected task payload for ${taskId}`, this.baseUrl + path)
    }
    return task
  }

  async listCommentsForTask(taskId: string): Promise<TodoistComment[]> {
    const items = await this.listPaged('/comments', { task_id: taskId })
    return compact(items.map(toComment))
  }

  async listActiveTasksForProject(projectId: string): Promise<TodoistTask[]> {
    const items = await this.listPaged('/tasks', { project_id: projectId })
    return compact(items.map(toTask))
  }

  async listAllActiveTasks(): Promise<TodoistTask[]> {
    const items = await this.listPaged('/tasks', {})
    return compact(items.map(toTask))
  }

  async deleteComment(commentId: string): Promise<void> {
    await this.send('DELETE', `${this.baseUrl}/comments/${encodeURIComponent(commentId)}`)
  }

  async deleteTask(taskId: string): Promise<void> {
    await this.send('DELETE', `${this.baseUrl}/tasks/${encodeURIComponent(taskId)}`)
  }

  async postWebhook(url: string, payload: JsonObject, bearerToken?: string | null): Promise<number> {
    const headers: Record<string, string> = { 'Content-Type': 'application/json' }
    if (bearerToken) {
      headers.Authorization = `Bearer ${bearerToken}`
    }
    const response = await this.send('POST', url, { headers, body: JSON.stringify(payload) })
    return response.status
  }

  /**
   * Collect every item of a list endpoint. Accepts a bare array or a
   * `{ results, next_cursor }` envelope and follows the cursor. Throws
   * when the cursor is still set after {@link MAX_PAGES} pages.
   */
  private async listPaged(path: string, query: Record<string, string>): Promise<unknown[]> {
    const items: unknown[] = []
    let cursor: string | null = null

    for (let page = 0; page < MAX_PAGES; page++) {
      const params: Record<string, string> = cursor ? { ...query, cursor } : query
      const data = await this.getJson(path, params)

      if (Array.isArray(data)) {
        items.push(...data)
        return items
      }
      if (!isRecord(data)) {
        return items
      }
      if (Array.isArray(data.results)) {
        items.push(...data.results)
      }
      cursor = readString(data, 'next_cursor')
      if (!cursor) {
        return items
      }
    }

    const url = `${this.baseUrl}${path}`
    throw new TaskApiError(`GET ${url} pagination limit exceeded after ${MAX_PAGES} pages`, url)
  }

  private async getJson(path: string, query: Record<string, string> = {}): Promise<unknown> {
    const search = new URLSearchParams(query).toString()
    const url = `${this.baseUrl}${path}${search ? `?${search}` : ''}`
    const response = await this.send('GET', url)
    const body: unknown = await response.json()
    return body
  }

  private async send(
    method: string,
    url: string,
    init: { headers?: Record<string, string>; body?: string } = {},
  ): Promise<Response> {
    const headers = url.startsWith(this.baseUrl)
      ? { Authorization: `Bearer ${this.apiToken}`, ...init.headers }
      : { ...init.headers }

    let response: Response
    try {
      response = await fetch(url, {
        method,
        headers,
        body: init.body,
        signal: AbortSignal.timeout(this.timeoutMs),
      })
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err)
      throw new TaskApiError(`${method} ${url} failed: ${reason}`, url)
    }

    if (!response.ok) {
      throw new TaskApiError(
        `${method} ${url} failed with status ${response.status}`,
        url,
        response.status,
      )
    }
    return response
  }
}
