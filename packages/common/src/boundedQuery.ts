import { createHash } from 'node:crypto'
import type { Logger } from './logger.js'
import type { QueryResult, RecordValue } from './queryResult.js'
import { queryFailed, querySucceeded, serializeQueryResult } from './queryResult.js'
import type { Invoker } from './types/invoker.js'

// --- Types ---

/** A started query: its rows, in order, and the field names known once rows have been read. */
export interface QueryCursor {
  readonly rows: AsyncIterable<readonly RecordValue[]> | Iterable<readonly RecordValue[]>
  headers(): readonly string[]
  close?(): Promise<void>
}

/** Starts `query` against the backing store. Timeouts and access mode are the opener's concern. */
export type QueryOpener = (query: string) => Promise<QueryCursor>

export interface BoundedQueryOptions {
  readonly limit: number
  readonly logger: Logger
}

export interface BoundedRows<T> {
  readonly records: T[]
  readonly hasMore: boolean
}

// --- Collection ---

/**
 * Pull at most `limit` rows, then peek one more. Leaving the loop early
 * runs the iterator's `return()`, which lets drivers stop streaming.
 * An iterator that ends during the peek means there is nothing more.
 */
export async function collectBounded<T>(rows: AsyncIterable<T> | Iterable<T>, limit: number): Promise<BoundedRows<T>> {
  const records: T[] = []
  let hasMore = false
  for await (const row of rows) {
    if (records.length >= limit) {
      hasMore = true
      break
    }
    records.push(row)
  }
  return { records, hasMore }
}

// --- Execution ---

export function queryHash(query: string): string {
  return createHash('md5').update(query, 'utf8').digest('hex')
}

/**
 * Run one query and report the outcome as data.
 * Never rejects: any failure while opening, reading or closing the cursor
 * comes back as a `QueryResult` with `error` set.
 */
export async function executeBoundedQuery(
  query: string,
  open: QueryOpener,
  options: BoundedQueryOptions,
): Promise<QueryResult> {
  const { limit, logger } = options
  const hash = queryHash(query)
  logger.debug({ query }, 'executing query')
  logger.info({ queryHash: hash }, 'executing query')

  try {
    const cursor = await open(query)
    let collected: BoundedRows<readonly RecordValue[]>
    let headers: readonly string[]
    try {
      collected = await collectBounded(cursor.rows, limit)
      headers = cursor.headers()
    } finally {
      await cursor.close?.()
    }

    logger.info(
      { queryHash: hash, records: collected.records.length, hasMore: collected.hasMore },
      'executed query',
    )
    return querySucceeded(headers, collected.records, collected.hasMore)
  } catch (err) {
    logger.warn({ queryHash: hash, err }, 'query failed')
    return queryFailed(err)
  }
}

/** An invoker whose output is the JSON form of `executeBoundedQuery()`. */
export function createBoundedQueryInvoker(open: QueryOpener, options: BoundedQueryOptions): Invoker {
  return {
    async invoke(input: string): Promise<string> {
      const result = await executeBoundedQuery(input, open, options)
      const output = serializeQueryResult(result)
      options.logger.debug({ query: input, result: output }, 'query result')
      return output
    },
  }
}
