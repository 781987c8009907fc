import type {
  Env,
  Invoker,
  InvokerBuilder,
  InvokerConfig,
  Logger,
  QueryCursor,
  RecordValue,
} from '@pipeline-invokers/common'
import {
  ConnectionError,
  createBoundedQueryInvoker,
  makeLogger,
  normalizeValue,
  positiveInteger,
  readInvokerConfig,
  SharedClientProvider,
  timeoutSeconds,
  toError,
} from '@pipeline-invokers/common'
import type { ConnectionOptions } from 'trino-client'
import { Trino } from 'trino-client'
import { z } from 'zod'

// ── Config ─────────────────────────────────────────────────────

/** Keys of a `trino` step, each falling back to `TRINO_<KEY>`. */
export const trinoConfigSchema = z.object({
  server: z.string().min(1),
  catalog: z.string().optional(),
  schema: z.string().optional(),
  username: z.string().optional(),
  source: z.string().optional(),
  limit: positiveInteger.default(1000),
  query_timeout: timeoutSeconds.optional(),
})

export type TrinoInvokerConfig = z.output<typeof trinoConfigSchema>

export interface TrinoInvokerOptions {
  readonly clients?: SharedClientProvider<Trino> | undefined
  readonly env?: Env | undefined
  readonly logger?: Logger | undefined
}

// ── Shared Client ──────────────────────────────────────────────

// trino-client speaks HTTP and holds no connection to close
export const trinoClients = new SharedClientProvider<Trino>(async () => {})

function connectionOptions(config: TrinoInvokerConfig): ConnectionOptions {
  return {
    server: config.server,
    ...(config.catalog !== undefined ? { catalog: config.catalog } : {}),
    ...(config.schema !== undefined ? { schema: config.schema } : {}),
    ...(config.source !== undefined ? { source: config.source } : {}),
    ...(config.username !== undefined ? { extraHeaders: { 'X-Trino-User': config.username } } : {}),
  }
}

async function drain(trino: Trino, sql: string): Promise<void> {
  const iter = await trino.query(sql)
  for await (const page of iter) {
    if (page.error !== undefined) throw new Error(page.error.message)
  }
}

async function connect(config: TrinoInvokerConfig, log: Logger): Promise<Trino> {
  const trino = Trino.create(connectionOptions(config))
  try {
    await drain(trino, 'SELECT 1')
  } catch (err) {
    throw new ConnectionError({ type: 'trino', endpoint: config.server }, toError(err))
  }
  log.info({ server: config.server }, 'trino client connected')
  return trino
}

// ── Invoker ────────────────────────────────────────────────────

/**
 * SQL query invoker over the Trino REST protocol. Result pages are streamed
 * and the query is cancelled once enough rows have been read. Query failures,
 * including client-side timeouts, are reported in the result's `error`.
 */
export async function createTrinoInvoker(config: InvokerConfig, options: TrinoInvokerOptions = {}): Promise<Invoker> {
  const settings = readInvokerConfig({ type: 'trino', envPrefix: 'TRINO', schema: trinoConfigSchema, config, env: options.env })
  const log = options.logger ?? makeLogger({ component: 'trino-invoker' })
  const clients = options.clients ?? trinoClients

  const key = `${settings.server}|${settings.username ?? ''}`
  const trino = await clients.acquire(key, () => connect(settings, log))
  const timeoutSec = settings.query_timeout !== undefined && settings.query_timeout > 0 ? settings.query_timeout : undefined

  async function open(query: string): Promise<QueryCursor> {
    const iter = await trino.query(query)
    const columns: string[] = []
    let queryId: string | undefined
    let finished = false
    let timedOut = false

    const cancel = async (): Promise<void> => {
      if (queryId === undefined) return
      try {
        await trino.cancel(queryId)
      } catch (err) {
        log.warn({ queryId, err }, 'trino cancel failed')
      }
    }

    const timer =
      timeoutSec !== undefined
        ? setTimeout(() => {
            timedOut = true
            void cancel()
          }, timeoutSec * 1000)
        : undefined

    async function* rows(): AsyncGenerator<RecordValue[]> {
      for await (const page of iter) {
        queryId = page.id
        if (timedOut) throw new Error(`Query exceeded timeout of ${String(timeoutSec)}s`)
        if (page.error !== undefined) throw new Error(page.error.message)

        if (page.columns !== undefined && columns.length === 0) {
          for (const col of page.columns) {
            columns.push(col.name)
          }
        }
        for (const row of page.data ?? []) {
          yield row.map((v: unknown) => normalizeValue(v))
        }
      }
      if (timedOut) throw new Error(`Query exceeded timeout of ${String(timeoutSec)}s`)
      finished = true
    }

    return {
      rows: rows(),
      headers: () => columns,
      async close() {
        if (timer !== undefined) clearTimeout(timer)
        if (!finished) await cancel()
      },
    }
  }

  return createBoundedQueryInvoker(open, { limit: settings.limit, logger: log })
}

export function trinoBuilder(options: TrinoInvokerOptions = {}): InvokerBuilder {
  return (config) => createTrinoInvoker(config, options)
}
