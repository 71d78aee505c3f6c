import { readFileSync } from 'node:fs'
import { resolve } from 'node:path'
import { ConfigError } from './errors.js'
import { isRecord } from './json.js'
import { isValidTimeZone } from './local-time.js'
import type { DatabaseType, WorkerConfig } from './types.js'

/** Raw configuration values keyed by environment variable name. */
export type ConfigSource = Record<string, string | undefined>

const DATABASE_TYPES: readonly DatabaseType[] = ['postgres', 'mysql', 'sqlite']
const TRUE_VALUES = new Set(['1', 'true', 'yes', 'on'])

function value(source: ConfigSource, name: string): string | null {
  const raw = source[name]?.trim()
  return raw ? raw : null
}

function requireValue(source: ConfigSource, name: string): string {
  const raw = value(source, name)
  if (!raw) {
    throw new ConfigError(`Missing required configuration value ${name}`)
  }
  return raw
}

function parseBool(source: ConfigSource, name: string, fallback: boolean): boolean {
  const raw = value(source, name)
  return raw === null ? fallback : TRUE_VALUES.has(raw.toLowerCase())
}

function parseNonNegativeInt(source: ConfigSource, name: string, fallback: number): number {
  const raw = value(source, name)
  if (raw === null) {
    return fallback
  }
  if (!/^\d+$/.test(raw)) {
    throw new ConfigError(`Invalid ${name} value: ${raw}`)
  }
  return Number(raw)
}

function parseList(source: ConfigSource, name: string, fallback: string[] = []): string[] {
  const raw = source[name]
  if (raw === undefined) {
    return fallback
  }
  return raw
    .split(',')
    .map((s) => s.trim())
    .filter((s) => s.length > 0)
}

function parseDatabaseType(source: ConfigSource): DatabaseType {
  const raw = (value(source, 'RULES_WORKER_DATABASE_TYPE') ?? 'sqlite').toLowerCase()
  const type = DATABASE_TYPES.find((t) => t === raw)
  if (!type) {
    throw new ConfigError(
      `RULES_WORKER_DATABASE_TYPE must be one of: ${DATABASE_TYPES.join(', ')}. Got: "${raw}"`,
    )
  }
  return type
}

/**
 * Build a {@link WorkerConfig} from a string map such as `process.env`.
 * Throws {@link ConfigError} on missing or invalid values.
 */
export function loadConfig(source: ConfigSource): WorkerConfig {
  const port = parseNonNegativeInt(source, 'RULES_WORKER_PORT', 8081)
  if (port < 1 || port > 65535) {
    throw new ConfigError(`Invalid RULES_WORKER_PORT value: ${port}`)
  }

  const timeoutMs = parseNonNegativeInt(source, 'RULES_WORKER_TIMEOUT_MS', 10_000)
  if (timeoutMs < 1) {
    throw new ConfigError(`Invalid RULES_WORKER_TIMEOUT_MS value: ${timeoutMs}`)
  }

  const timezone = value(source, 'RULES_WORKER_REMINDER_TIMEZONE') ?? 'America/Chicago'
  if (!isValidTimeZone(timezone)) {
    throw new ConfigError(`Unknown RULES_WORKER_REMINDER_TIMEZONE: ${timezone}`)
  }

  return {
    host: value(source, 'RULES_WORKER_HOST') ?? '0.0.0.0',
    port,
    todoistApiToken: requireValue(source, 'TODOIST_API_KEY'),
    webhookSecret: requireValue(source, 'TODOIST_CLIENT_SECRET'),
    adminToken: value(source, 'RULES_WORKER_ADMIN_TOKEN'),
    database: {
      type: parseDatabaseType(source),
      url: value(source, 'RULES_WORKER_DATABASE_URL') ?? 'events.sqlite',
    },
    timeoutMs,
    enabled: parseBool(source, 'RULES_WORKER_ENABLED', true),
    dryRun: parseBool(source, 'RULES_WORKER_DRY_RUN', false),
    rules: {
      recurring_clear_comments_on_completion: parseBool(
        source,
        'RULES_WORKER_RULE_RECURRING_CLEAR_COMMENTS',
        true,
      ),
      recurring_purge_subtasks_on_completion: parseBool(
        source,
        'RULES_WORKER_RULE_RECURRING_PURGE_SUBTASKS',
        false,
      ),
      reminder_notify: parseBool(source, 'RULES_WORKER_RULE_REMINDER_NOTIFY', false),
    },
    allowedUserIds: parseList(source, 'RULES_WORKER_ALLOWED_USER_IDS'),
    allowedProjectIds: parseList(source, 'RULES_WORKER_ALLOWED_PROJECT_IDS'),
    deniedProjectIds: parseList(source, 'RULES_WORKER_DENIED_PROJECT_IDS'),
    keepMarkers: parseList(source, 'RULES_WORKER_KEEP_MARKERS', ['[keep]']),
    maxDeleteComments: parseNonNegativeInt(source, 'RULES_WORKER_MAX_DELETE_COMMENTS', 200),
    maxDeleteSubtasks: parseNonNegativeInt(source, 'RULES_WORKER_MAX_DELETE_SUBTASKS', 200),
    reminder: {
      webhookUrl: value(source, 'RULES_WORKER_REMINDER_WEBHOOK_URL'),
      webhookToken: value(source, 'RULES_WORKER_REMINDER_WEBHOOK_TOKEN'),
      requireFocusLabel: parseBool(source, 'RULES_WORKER_REMINDER_REQUIRE_FOCUS_LABEL', false),
      cooldownMinutes: parseNonNegativeInt(source, 'RULES_WORKER_REMINDER_COOLDOWN_MINUTES', 60),
      timezone,
      channel: value(source, 'RULES_WORKER_REMINDER_CHANNEL') ?? 'discord',
      to: value(source, 'RULES_WORKER_REMINDER_TO'),
    },
  }
}

/**
 * Read a JSON config file whose keys are the same names as the environment
 * variables. Scalars are coerced to strings; `null` entries are dropped.
 */
export function readConfigFile(filePath: string): ConfigSource {
  const absolute = resolve(process.cwd(), filePath)
  let parsed: unknown
  try {
    parsed = JSON.parse(readFileSync(absolute, 'utf8'))
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err)
    throw new ConfigError(`Failed to load config file ${filePath}: ${reason}`)
  }
  if (!isRecord(parsed)) {
    throw new ConfigError(`Config file ${filePath} must contain a JSON object`)
  }

  const source: ConfigSource = {}
  for (const [key, raw] of Object.entries(parsed)) {
    if (typeof raw === 'string') {
      source[key] = raw
    } else if (typeof raw === 'number' || typeof raw === 'boolean') {
      source[key] = String(raw)
    } else if (Array.isArray(raw)) {
      source[key] = raw.map(String).join(',')
    } else if (raw !== null) {
      throw new ConfigError(`Config file ${filePath}: unsupported value for ${key}`)
    }
  }
  return source
}

export function parseArgs(args: string[]): { configPath?: string } {
  const result: { configPath?: string } = {}
  for (let i = 0; i < args.length; i++) {
    const arg = args[i]
    if (arg === '--config' || arg === '-c') {
      result.configPath = args[i + 1]
      i++
    }
  }
  return result
}

/** Environment overlaid by the `--config` file, if one is given. File values win. */
export function buildConfig(argv: string[], env: ConfigSource): WorkerConfig {
  const { configPath } = parseArgs(argv)
  if (!configPath) {
    return loadConfig(env)
  }
  return loadConfig({ ...env, ...readConfigFile(configPath) })
}
