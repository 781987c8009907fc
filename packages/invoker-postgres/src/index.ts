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
  booleanFlag,
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
import type { PoolConfig } from 'pg'
import { Pool, TypeOverrides } from 'pg'
import Cursor from 'pg-cursor'
import { z } from 'zod'

// ── Config ─────────────────────────────────────────────────────

/**
 * Keys of a `postgres` step, each falling back to `POSTGRES_<KEY>`.
 * `username`, `password` and `database_name` override the parts of `database_uri`.
 */
export const postgresConfigSchema = z.object({
  database_uri: z.string().min(1),
  username: z.string().optional(),
  password: z.string().optional(),
  database_name: z.string().optional(),
  limit: positiveInteger.default(1000),
  query_timeout: timeoutSeconds.optional(),
  write_queries: booleanFlag.default(false),
})

export type PostgresInvokerConfig = z.output<typeof postgresConfigSchema>

export interface PostgresInvokerOptions {
  readonly pools?: SharedClientProvider<Pool> | undefined
  readonly env?: Env | undefined
  readonly logger?: Logger | undefined
}

// ── Type Parsing ───────────────────────────────────────────────

const INT8_OID = 20
const NUMERIC_OID = 1700

/** int8 as a number inside the safe integer range, the decimal string outside it. */
export function parseInt8(value: string): number | string {
  const n = Number(value)
  return Number.isSafeInteger(n) ? n : value
}

/** numeric as a number only when the number prints back to the same text. */
export function parseNumeric(value: string): number | string {
  const n = Number(value)
  return Number.isFinite(n) && String(n) === value ? n : value
}

/** Parsers for this adapter's queries only; pg's global parsers stay untouched. */
export const postgresTypes = new TypeOverrides()
postgresTypes.setTypeParser(INT8_OID, 'text', parseInt8)
postgresTypes.setTypeParser(NUMERIC_OID, 'text', parseNumeric)

// ── Shared Pool ────────────────────────────────────────────────

export const postgresPools = new SharedClientProvider<Pool>((p) => p.end())

function poolConfig(config: PostgresInvokerConfig): PoolConfig {
  const options: PoolConfig = { connectionString: config.database_uri }
  if (config.username !== undefined) options.user = config.username
  if (config.password !== undefined) options.password = config.password
  if (config.database_name !== undefined) options.database = config.database_name
  return options
}

/** Connection string without credentials, for errors and logs. */
function endpointOf(uri: string): string {
  return uri.replace(/\/\/[^@/]*@/, '//')
}

async function connect(config: PostgresInvokerConfig, log: Logger): Promise<Pool> {
  const endpoint = endpointOf(config.database_uri)
  const pool = new Pool(poolConfig(config))
  try {
    await pool.query('SELECT 1')
  } catch (err) {
    await pool.end()
    throw new ConnectionError({ type: 'postgres', endpoint }, toError(err))
  }
  log.info({ endpoint }, 'postgres pool connected')
  return pool
}

interface Batch {
  readonly rows: unknown[][]
  readonly headers: string[]
}

function readBatch(cursor: Cursor<unknown[]>, count: number): Promise<Batch> {
  return new Promise((resolve, reject) => {
    cursor.read(count, (err, rows, result) => {
      if (err) {
        reject(err)
        return
      }
      resolve({ rows, headers: result.fields.map((f) => f.name) })
    })
  })
}

function* normalizeRows(rows: unknown[][]): Generator<RecordValue[]> {
  for (const row of rows) {
    yield row.map((v) => normalizeValue(v))
  }
}

// ── Invoker ────────────────────────────────────────────────────

/**
 * SQL query invoker. Each query runs in its own transaction, read-only unless
 * `write_queries` is set, with `statement_timeout` applied when configured.
 * Rows are read through a cursor, at most `limit + 1` of them.
 * Query failures are reported in the result's `error`.
 */
export async function createPostgresInvoker(
  config: InvokerConfig,
  options: PostgresInvokerOptions = {},
): Promise<Invoker> {
  const settings = readInvokerConfig({
    type: 'postgres',
    envPrefix: 'POSTGRES',
    schema: postgresConfigSchema,
    config,
    env: options.env,
  })
  const log = options.logger ?? makeLogger({ component: 'postgres-invoker' })
  const pools = options.pools ?? postgresPools

  const key = `${settings.database_uri}|${settings.username ?? ''}|${settings.database_name ?? ''}`
  const pool = await pools.acquire(key, () => connect(settings, log))

  const begin = settings.write_queries ? 'BEGIN READ WRITE' : 'BEGIN READ ONLY'
  // rounded up: 0 would disable the timeout
  const timeoutMs = settings.query_timeout !== undefined ? Math.ceil(settings.query_timeout * 1000) : undefined

  async function open(query: string): Promise<QueryCursor> {
    const client = await pool.connect()
    let batch: Batch
    try {
      await client.query(begin)
      if (timeoutMs !== undefined) {
        await client.query(`SET LOCAL statement_timeout = ${timeoutMs}`)
      }
      const cursor = client.query(new Cursor<unknown[]>(query, [], { rowMode: 'array', types: postgresTypes }))
      // one row past the limit tells whether more exist
      batch = await readBatch(cursor, settings.limit + 1)
      await cursor.close()
      await client.query('COMMIT')
    } catch (err) {
      // a client left inside a failed transaction is not returned to the pool
      client.release(toError(err))
      throw err
    }
    client.release()

    const { headers } = batch
    return { rows: normalizeRows(batch.rows), headers: () => headers }
  }

  return createBoundedQueryInvoker(open, { limit: settings.limit, logger: log })
}

export function postgresBuilder(options: PostgresInvokerOptions = {}): InvokerBuilder {
  return (config) => createPostgresInvoker(config, options)
}
