#!/usr/bin/env node

import dotenv from 'dotenv'
import { createLedger } from './adapters/index.js'
import { buildConfig } from './config.js'
import { ConfigError } from './errors.js'
import { evaluateFocusPolicy } from './policy.js'
import { createDefaultRules } from './rules/index.js'
import { createWorkerServer } from './server.js'
import { TodoistClient } from './task-client.js'
import type { WorkerConfig } from './types.js'

dotenv.config()

const BANNER = `
╔══════════════════════════════════════════╗
║          Todoist Rules Worker            ║
║   Recurring-task cleanup and reminders   ║
╚══════════════════════════════════════════╝
`

function loadOrExit(): WorkerConfig {
  try {
    return buildConfig(process.argv.slice(2), process.env)
  } catch (err) {
    if (err instanceof ConfigError) {
      console.error(`[rules-worker] ERROR: ${err.message}`)
      process.exit(2)
    }
    throw err
  }
}

function enabledRules(config: WorkerConfig): string {
  const names = Object.entries(config.rules)
    .filter(([, on]) => on)
    .map(([name]) => name)
  return names.length > 0 ? names.join(', ') : '(none)'
}

async function main(): Promise<void> {
  console.log(BANNER)

  const config = loadOrExit()

  console.log(`[rules-worker] Database type:  ${config.database.type}`)
  console.log(`[rules-worker] Port:           ${config.port}`)
  console.log(`[rules-worker] Enabled:        ${config.enabled}`)
  console.log(`[rules-worker] Dry run:        ${config.dryRun}`)
  console.log(`[rules-worker] Rules:          ${enabledRules(config)}`)
  console.log('')

  const ledger = await createLedger(config.database)

  console.log('[rules-worker] Connecting to database...')
  await ledger.connect()
  console.log('[rules-worker] Connected successfully.')

  console.log('[rules-worker] Ensuring tables exist...')
  await ledger.createTables()
  console.log('[rules-worker] Tables ready.')
  console.log('')

  const server = createWorkerServer({
    config,
    ledger,
    tasks: new TodoistClient({ apiToken: config.todoistApiToken, timeoutMs: config.timeoutMs }),
    policy: evaluateFocusPolicy,
    rules: createDefaultRules(),
  })
  await server.start()

  const base = `http://${config.host}:${config.port}`
  console.log(`[rules-worker] Listening on ${base}`)
  console.log(`[rules-worker] Webhook endpoint: POST ${base}/hooks/todoist`)
  console.log(`[rules-worker] Events endpoint:  GET  ${base}/api/events`)
  console.log(`[rules-worker] Health endpoint:  GET  ${base}/health`)
  if (!config.adminToken) {
    console.log('[rules-worker] RULES_WORKER_ADMIN_TOKEN is not set; admin endpoints are disabled.')
  }
  console.log('')
  console.log('[rules-worker] Ready to receive Todoist webhooks.')
  console.log('[rules-worker] Press Ctrl+C to stop.')

  // Graceful shutdown
  const shutdown = async (signal: string) => {
    console.log('')
    console.log(`[rules-worker] Received ${signal}. Shutting down gracefully...`)
    try {
      await server.stop()
      console.log('[rules-worker] Server stopped. Goodbye!')
      process.exit(0)
    } catch (err) {
      console.error('[rules-worker] Error during shutdown:', err)
      process.exit(1)
    }
  }

  process.on('SIGINT', () => void shutdown('SIGINT'))
  process.on('SIGTERM', () => void shutdown('SIGTERM'))
}

main().catch((err) => {
  console.error('[rules-worker] Fatal error:', err)
  process.exit(1)
})
