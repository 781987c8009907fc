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
import type { Driver, Record as Neo4jRecord, Result } from 'neo4j-driver'
import { auth, driver as openDriver, isInt, isNode, isPath, isRelationship } from 'neo4j-driver'
import { z } from 'zod'

// ── Config ─────────────────────────────────────────────────────

/**
 * Keys of a `neo4j` step. Each one falls back to `NEO4J_<KEY>` when absent:
 *
 * - `database_uri`, `username`, `password`: server and credentials
 * - `database_name`: target database; the user's home database when absent
 * - `limit`: most records returned per query (default 1000)
 * - `query_timeout`: seconds; 0 waits indefinitely, absent uses the server default
 * - `write_queries`: open write sessions instead of read sessions (default false)
 */
export const neo4jConfigSchema = z.object({
  database_uri: z.string().min(1),
  username: z.string(),
  password: z.string(),
  database_name: z.string().optional(),
  limit: positiveInteger.default(1000),
  query_timeout: timeoutSeconds.optional(),
  write_queries: booleanFlag.default(false),
})

export type Neo4jInvokerConfig = z.output<typeof neo4jConfigSchema>

export interface Neo4jInvokerOptions {
  /** Drivers shared by every invoker built with these options. Defaults to the process-wide provider. */
  readonly drivers?: SharedClientProvider<Driver> | undefined
  readonly env?: Env | undefined
  readonly logger?: Logger | undefined
}

// ── Shared Driver ──────────────────────────────────────────────

export const neo4jDrivers = new SharedClientProvider<Driver>((d) => d.close())

async function connect(config: Neo4jInvokerConfig, log: Logger): Promise<Driver> {
  log.debug({ uri: config.database_uri, username: config.username }, 'creating neo4j driver')
  const d = openDriver(config.database_uri, auth.basic(config.username, config.password))
  try {
    await d.verifyConnectivity()
  } catch (err) {
    await d.close()
    throw new ConnectionError({ type: 'neo4j', endpoint: config.database_uri }, toError(err))
  }
  log.info({ uri: config.database_uri }, 'neo4j driver connected')
  return d
}

// ── Values ─────────────────────────────────────────────────────

function graphValue(value: unknown): RecordValue | undefined {
  if (isInt(value)) return value.inSafeRange() ? value.toNumber() : value.toString()
  if (typeof value !== 'object' || value === null) return undefined
  if (isNode(value) || isRelationship(value)) return normalizeValue(value.properties, graphValue)
  if (isPath(value)) {
    const nodes = [value.start, ...value.segments.map((s) => s.end)]
    return nodes.map((n) => normalizeValue(n.properties, graphValue))
  }
  return undefined
}

function recordValues(record: Neo4jRecord): RecordValue[] {
  return record.keys.map((_, i) => normalizeValue(record.get(i), graphValue))
}

async function* streamRecords(result: Result): AsyncGenerator<RecordValue[]> {
  for await (const record of result) {
    yield recordValues(record)
  }
}

// ── Invoker ────────────────────────────────────────────────────

/**
 * Graph query invoker. The input is a Cypher query; the output is the JSON
 * form of a `QueryResult`. Query failures are reported in `error` and never
 * thrown. Connection failures while the shared driver is first created are
 * thrown from construction.
 */
export async function createNeo4jInvoker(config: InvokerConfig, options: Neo4jInvokerOptions = {}): Promise<Invoker> {
  const settings = readInvokerConfig({ type: 'neo4j', envPrefix: 'NEO4J', schema: neo4jConfigSchema, config, env: options.env })
  const log = options.logger ?? makeLogger({ component: 'neo4j-invoker' })
  const drivers = options.drivers ?? neo4jDrivers

  const key = `${settings.database_uri}|${settings.username}`
  const d = await drivers.acquire(key, () => connect(settings, log))

  const accessMode = settings.write_queries ? 'WRITE' : 'READ'
  const timeoutMs = settings.query_timeout !== undefined ? settings.query_timeout * 1000 : undefined

  async function open(query: string): Promise<QueryCursor> {
    const session = d.session({
      defaultAccessMode: accessMode,
      ...(settings.database_name !== undefined ? { database: settings.database_name } : {}),
    })
    try {
      const result = session.run(query, {}, timeoutMs !== undefined ? { timeout: timeoutMs } : undefined)
      const headers = await result.keys()
      return {
        rows: streamRecords(result),
        headers: () => headers.map(String),
        close: () => session.close(),
      }
    } catch (err) {
      await session.close()
      throw err
    }
  }

  return createBoundedQueryInvoker(open, { limit: settings.limit, logger: log })
}

export function neo4jBuilder(options: Neo4jInvokerOptions = {}): InvokerBuilder {
  return (config) => createNeo4jInvoker(config, options)
}
