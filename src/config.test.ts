import fs from 'node:fs'
import os from 'node:os'
import path from 'node:path'
import { afterEach, beforeEach, describe, expect, it } from 'vitest'
import { buildConfig, loadConfig, parseArgs, readConfigFile } from './config.js'
import { ConfigError } from './errors.js'

const required = { TODOIST_API_KEY: 'test-token', TODOIST_CLIENT_SECRET: 'test-secret' }

describe('loadConfig', () => {
  it('applies defaults', () => {
    const config = loadConfig(required)

    expect(config).toMatchObject({
      host: '0.0.0.0',
      port: 8081,
      todoistApiToken: 'test-token',
      webhookSecret: 'test-secret',
      adminToken: null,
      database: { type: 'sqlite', url: 'events.sqlite' },
      timeoutMs: 10_000,
      enabled: true,
      dryRun: false,
      rules: {
        recurring_clear_comments_on_completion: true,
        recurring_purge_subtasks_on_completion: false,
        reminder_notify: false,
      },
      allowedUserIds: [],
      keepMarkers: ['[keep]'],
      maxDeleteComments: 200,
      maxDeleteSubtasks: 200,
    })
    expect(config.reminder).toEqual({
      webhookUrl: null,
      webhookToken: null,
      requireFocusLabel: false,
      cooldownMinutes: 60,
      timezone: 'America/Chicago',
      channel: 'discord',
      to: null,
    })
  })

  it('requires the API token and the webhook secret', () => {
    expect(() => loadConfig({ TODOIST_CLIENT_SECRET: 'test-secret' })).toThrow(
      'Missing required configuration value TODOIST_API_KEY',
    )
    expect(() => loadConfig({ TODOIST_API_KEY: 'test-token', TODOIST_CLIENT_SECRET: '  ' })).toThrow(
      ConfigError,
    )
  })

  it('parses booleans leniently', () => {
    const config = loadConfig({
      ...required,
      RULES_WORKER_DRY_RUN: 'YES',
      RULES_WORKER_ENABLED: 'off',
      RULES_WORKER_RULE_REMINDER_NOTIFY: '1',
      RULES_WORKER_RULE_RECURRING_CLEAR_COMMENTS: 'nope',
    })
    expect(config.dryRun).toBe(true)
    expect(config.enabled).toBe(false)
    expect(config.rules.reminder_notify).toBe(true)
    expect(config.rules.recurring_clear_comments_on_completion).toBe(false)
  })

  it('splits comma-separated lists', () => {
    const config = loadConfig({
      ...required,
      RULES_WORKER_ALLOWED_PROJECT_IDS: ' p1, ,p2 ',
      RULES_WORKER_KEEP_MARKERS: '',
    })
    expect(config.allowedProjectIds).toEqual(['p1', 'p2'])
    expect(config.keepMarkers).toEqual([])
  })

  it('rejects invalid numbers', () => {
    expect(() => loadConfig({ ...required, RULES_WORKER_PORT: 'abc' })).toThrow(
      'Invalid RULES_WORKER_PORT value: abc',
    )
    expect(() => loadConfig({ ...required, RULES_WORKER_PORT: '0' })).toThrow(ConfigError)
    expect(() => loadConfig({ ...required, RULES_WORKER_PORT: '70000' })).toThrow(ConfigError)
    expect(() => loadConfig({ ...required, RULES_WORKER_MAX_DELETE_COMMENTS: '-1' })).toThrow(
      ConfigError,
    )
  })

  it('requires a positive outbound timeout', () => {
    expect(() => loadConfig({ ...required, RULES_WORKER_TIMEOUT_MS: '0' })).toThrow(
      'Invalid RULES_WORKER_TIMEOUT_MS value: 0',
    )
    expect(loadConfig({ ...required, RULES_WORKER_TIMEOUT_MS: '1' }).timeoutMs).toBe(1)
  })

  it('rejects an unknown timezone', () => {
    expect(() => loadConfig({ ...required, RULES_WORKER_REMINDER_TIMEZONE: 'Mars/Olympus' })).toThrow(
      'Unknown RULES_WORKER_REMINDER_TIMEZONE: Mars/Olympus',
    )
  })

  it('validates the database type', () => {
    expect(loadConfig({ ...required, RULES_WORKER_DATABASE_TYPE: 'POSTGRES' }).database.type).toBe(
      'postgres',
    )
    expect(() => loadConfig({ ...required, RULES_WORKER_DATABASE_TYPE: 'oracle' })).toThrow(ConfigError)
  })
})

describe('parseArgs', () => {
  it('reads --config and -c', () => {
    expect(parseArgs(['--config', 'a.json'])).toEqual({ configPath: 'a.json' })
    expect(parseArgs(['-c', 'b.json'])).toEqual({ configPath: 'b.json' })
    expect(parseArgs([])).toEqual({})
  })
})

describe('config file', () => {
  let tmpDir: string

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'rules-worker-config-'))
  })

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true })
  })

  it('overlays file values on the environment', () => {
    const file = path.join(tmpDir, 'config.json')
    fs.writeFileSync(
      file,
      JSON.stringify({
        RULES_WORKER_PORT: 9000,
        RULES_WORKER_DRY_RUN: true,
        RULES_WORKER_ALLOWED_USER_IDS: ['u1', 'u2'],
        RULES_WORKER_REMINDER_TO: null,
      }),
    )

    const config = buildConfig(['--config', file], { ...required, RULES_WORKER_PORT: '8000' })

    expect(config.port).toBe(9000)
    expect(config.dryRun).toBe(true)
    expect(config.allowedUserIds).toEqual(['u1', 'u2'])
    expect(config.todoistApiToken).toBe('test-token')
  })

  it('reports unreadable files as ConfigError', () => {
    const file = path.join(tmpDir, 'broken.json')
    fs.writeFileSync(file, '{ not json')
    expect(() => readConfigFile(file)).toThrow(ConfigError)
    expect(() => readConfigFile(path.join(tmpDir, 'missing.json'))).toThrow(ConfigError)
  })

  it('requires a top-level object', () => {
    const file = path.join(tmpDir, 'list.json')
    fs.writeFileSync(file, '[]')
    expect(() => readConfigFile(file)).toThrow(`Config file ${file} must contain a JSON object`)
  })
})
