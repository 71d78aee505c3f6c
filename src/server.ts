import { timingSafeEqual } from 'node:crypto'
import { createServer as createHttpServer, type IncomingMessage, type ServerResponse } from 'node:http'
import type { AddressInfo } from 'node:net'
import { processDelivery, type PipelineDeps } from './pipeline.js'

/** Read the full request body as raw bytes. Signatures are computed over these. */
function readBody(req: IncomingMessage): Promise<Buffer> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = []
    req.on('data', (chunk: Buffer) => chunks.push(chunk))
    req.on('end', () => resolve(Buffer.concat(chunks)))
    req.on('error', reject)
  })
}

/** Send a JSON response. */
function sendJson(
  res: ServerResponse,
  statusCode: number,
  data: unknown,
): void {
  const body = JSON.stringify(data)
  res.writeHead(statusCode, {
    'Content-Type': 'application/json',
    'Content-Length': Buffer.byteLength(body),
  })
  res.end(body)
}

/** Parse the URL path and query string. */
function parseUrl(url: string | undefined): { path: string; query: URLSearchParams } {
  const parsed = new URL(url ?? '/', 'http://localhost')
  return { path: parsed.pathname, query: parsed.searchParams }
}

function header(req: IncomingMessage, name: string): string | undefined {
  const value = req.headers[name]
  return Array.isArray(value) ? value[0] : value
}

/** Percent-decode one path segment, or `null` when the escape is malformed. */
function decodePathSegment(segment: string): string | null {
  try {
    return decodeURIComponent(segment)
  } catch (err) {
    if (err instanceof URIError) {
      return null
    }
    throw err
  }
}

function intParam(query: URLSearchParams, name: string): number | undefined {
  const raw = query.get(name)
  if (raw === null) return undefined
  const parsed = parseInt(raw, 10)
  return Number.isNaN(parsed) ? undefined : parsed
}

function isAdmin(req: IncomingMessage, adminToken: string | null): boolean {
  if (!adminToken) {
    return false
  }
  const auth = header(req, 'authorization') ?? ''
  const expected = Buffer.from(`Bearer ${adminToken}`, 'utf8')
  const actual = Buffer.from(auth, 'utf8')
  return actual.length === expected.length && timingSafeEqual(actual, expected)
}

const EVENT_PATH = /^\/api\/events\/([^/]+)$/

export interface RulesWorkerServer {
  /** Start listening on the configured host and port. */
  start(): Promise<void>
  /** Stop accepting requests and close the ledger. */
  stop(): Promise<void>
  /** The bound address, once started. */
  address(): AddressInfo | null
}

/**
 * Create the rules worker HTTP server.
 *
 * Endpoints:
 * - `POST /hooks/todoist`        - Verify, record and process a Todoist webhook
 * - `GET  /health`               - Liveness check
 * - `GET  /api/events`           - Recent receipts (`limit`, `offset`), admin only
 * - `GET  /api/events/:id`       - One receipt and its action outcomes, admin only
 */
export function createWorkerServer(deps: PipelineDeps): RulesWorkerServer {
  const { config, ledger } = deps

  const server = createHttpServer(async (req, res) => {
    const method = req.method?.toUpperCase() ?? 'GET'
    const { path, query } = parseUrl(req.url)

    try {
      if (method === 'GET' && path === '/health') {
        sendJson(res, 200, { ok: true })
        return
      }

      if (method === 'POST' && path === '/hooks/todoist') {
        const rawBody = await readBody(req)
        const result = await processDelivery(deps, {
          rawBody,
          signature: header(req, 'x-todoist-hmac-sha256'),
          deliveryId: header(req, 'x-todoist-delivery-id'),
        })
        sendJson(res, result.statusCode, result.body)
        return
      }

      if (method === 'GET' && path.startsWith('/api/events')) {
        if (!isAdmin(req, config.adminToken)) {
          sendJson(res, 401, { ok: false, error: 'unauthorized' })
          return
        }

        if (path === '/api/events') {
          const items = await ledger.listReceipts({
            limit: intParam(query, 'limit'),
            offset: intParam(query, 'offset'),
          })
          sendJson(res, 200, { ok: true, items })
          return
        }

        const match = EVENT_PATH.exec(path)
        if (match) {
          const deliveryId = decodePathSegment(match[1])
          const receipt = deliveryId === null ? null : await ledger.getReceipt(deliveryId)
          if (!receipt) {
            sendJson(res, 404, { ok: false, error: 'not_found' })
            return
          }
          const actions = await ledger.listActions(receipt.delivery_id)
          sendJson(res, 200, { ok: true, receipt, actions })
          return
        }
      }

      sendJson(res, 404, { ok: false, error: 'not_found' })
    } catch (err) {
      console.error('[rules-worker] Request error:', err)
      sendJson(res, 500, { ok: false, error: 'internal_error' })
    }
  })

  return {
    start() {
      return new Promise<void>((resolve, reject) => {
        server.once('error', reject)
        server.listen(config.port, config.host, () => {
          server.off('error', reject)
          resolve()
        })
      })
    },

    stop() {
      return new Promise<void>((resolve, reject) => {
        server.close(async (err) => {
          if (err) {
            reject(err)
            return
          }
          try {
            await ledger.close()
            resolve()
          } catch (closeErr) {
            reject(closeErr)
          }
        })
      })
    },

    address() {
      const address = server.address()
      return address !== null && typeof address === 'object' ? address : null
    },
  }
}
