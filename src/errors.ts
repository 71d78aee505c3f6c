export class ConfigError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'ConfigError'
  }
}

/** A non-2xx response (or a network failure) from the Todoist API or a notification hook. */
export class TaskApiError extends Error {
  readonly status: number | null
  readonly url: string

  constructor(message: string, url: string, status: number | null = null) {
    super(message)
    this.name = 'TaskApiError'
    this.url = url
    this.status = status
  }
}
