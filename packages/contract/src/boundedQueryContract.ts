import type { Invoker, RecordValue } from '@pipeline-invokers/common'
import { parseQueryResult } from '@pipeline-invokers/common'
import { describe, expect, it } from 'vitest'

// ── Types ──────────────────────────────────────────────────────

export interface SeededRows {
  readonly headers: string[]
  readonly rows: RecordValue[][]
  readonly limit: number
}

export interface BoundedQueryHarness {
  /** Build an invoker with `limit` whose store answers every query with `headers` and `rows`. */
  withRows(seed: SeededRows): Promise<Invoker>
  /** Build an invoker whose store fails every query with `error`. */
  withFailure(error: Error): Promise<Invoker>
  /** A query text the adapter accepts. */
  readonly query: string
}

// ── Helpers ────────────────────────────────────────────────────

function numberedRows(count: number): RecordValue[][] {
  return Array.from({ length: count }, (_, i) => [i + 1, `row-${i + 1}`])
}

const headers = ['id', 'name']

// ── describeBoundedQueryContract ───────────────────────────────

export function describeBoundedQueryContract(name: string, harness: BoundedQueryHarness): void {
  describe(`BoundedQueryContract: ${name}`, () => {
    it('B100: exactly limit rows → all rows, has_more false', async () => {
      const invoker = await harness.withRows({ headers, rows: numberedRows(3), limit: 3 })
      const result = parseQueryResult(await invoker.invoke(harness.query))
      expect(result).toEqual({ headers, records: numberedRows(3), hasMore: false, error: null })
    })

    it('B101: limit + 1 rows → exactly limit rows, has_more true', async () => {
      const invoker = await harness.withRows({ headers, rows: numberedRows(4), limit: 3 })
      const result = parseQueryResult(await invoker.invoke(harness.query))
      expect(result).toEqual({ headers, records: numberedRows(3), hasMore: true, error: null })
    })

    it('B102: many more rows than limit → limit rows, has_more true', async () => {
      const invoker = await harness.withRows({ headers, rows: numberedRows(25), limit: 2 })
      const result = parseQueryResult(await invoker.invoke(harness.query))
      expect(result.records).toEqual([
        [1, 'row-1'],
        [2, 'row-2'],
      ])
      expect(result.hasMore).toBe(true)
    })

    it('B103: fewer rows than limit → all rows, has_more false', async () => {
      const invoker = await harness.withRows({ headers, rows: numberedRows(2), limit: 1000 })
      const result = parseQueryResult(await invoker.invoke(harness.query))
      expect(result.records).toEqual(numberedRows(2))
      expect(result.hasMore).toBe(false)
    })

    it('B104: empty result keeps headers', async () => {
      const invoker = await harness.withRows({ headers, rows: [], limit: 10 })
      const result = parseQueryResult(await invoker.invoke(harness.query))
      expect(result).toEqual({ headers, records: [], hasMore: false, error: null })
    })

    it('B105: store failure is returned as data, not thrown', async () => {
      const invoker = await harness.withFailure(new Error('Invalid input syntax near MATCH'))
      const output = await invoker.invoke(harness.query)
      expect(parseQueryResult(output)).toEqual({
        headers: [],
        records: [],
        hasMore: false,
        error: 'Invalid input syntax near MATCH',
      })
    })

    it('B106: output keys in order headers, records, has_more, error', async () => {
      const invoker = await harness.withRows({ headers, rows: numberedRows(1), limit: 5 })
      const output = await invoker.invoke(harness.query)
      expect(output).toBe('{"headers":["id","name"],"records":[[1,"row-1"]],"has_more":false,"error":null}')
    })
  })
}
