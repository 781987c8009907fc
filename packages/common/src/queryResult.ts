import { z } from 'zod'
import { InputError } from './errors.js'

// --- Types ---

export type RecordValue = string | number | boolean | null | RecordValue[] | { [key: string]: RecordValue }

/**
 * Outcome of one bounded query.
 *
 * - `error` is set only when `headers` and `records` are both empty.
 * - `hasMore` is true iff at least one row existed beyond the fetch limit.
 */
export interface QueryResult {
  readonly headers: readonly string[]
  readonly records: readonly (readonly RecordValue[])[]
  readonly hasMore: boolean
  readonly error: string | null
}

// --- Constructors ---

export function querySucceeded(
  headers: readonly string[],
  records: readonly (readonly RecordValue[])[],
  hasMore: boolean,
): QueryResult {
  return { headers, records, hasMore, error: null }
}

export function queryFailed(err: unknown): QueryResult {
  return { headers: [], records: [], hasMore: false, error: errorMessage(err) }
}

function errorMessage(err: unknown): string {
  if (err instanceof Error && err.message.length > 0) return err.message
  if (err instanceof Error) return err.name
  const text = String(err)
  return text.length > 0 ? text : 'Unknown error'
}

// --- Wire Format ---

/** JSON with keys in the order `headers`, `records`, `has_more`, `error`. */
export function serializeQueryResult(result: QueryResult): string {
  return JSON.stringify({
    headers: result.headers,
    records: result.records,
    has_more: result.hasMore,
    error: result.error,
  })
}

const recordValueSchema: z.ZodType<RecordValue> = z.lazy(() =>
  z.union([z.string(), z.number(), z.boolean(), z.null(), z.array(recordValueSchema), z.record(recordValueSchema)]),
)

const wireSchema = z.object({
  headers: z.array(z.string()),
  records: z.array(z.array(recordValueSchema)),
  has_more: z.boolean(),
  error: z.string().nullable().optional(),
})

export function parseQueryResult(text: string): QueryResult {
  let raw: unknown
  try {
    raw = JSON.parse(text)
  } catch (err) {
    throw new InputError('UNPARSABLE_INPUT', 'Query result is not valid JSON', err instanceof Error ? err : undefined)
  }
  const parsed = wireSchema.safeParse(raw)
  if (!parsed.success) {
    throw new InputError('UNPARSABLE_INPUT', `Query result has an unexpected shape: ${parsed.error.issues[0]?.message}`)
  }
  const { headers, records, has_more, error } = parsed.data
  return { headers, records, hasMore: has_more, error: error ?? null }
}

// --- Value Normalization ---

/**
 * Turn a driver value into JSON-safe data.
 * Adapters with richer value types (graph nodes, 64-bit integers) normalize those first
 * and pass the rest through `fallback`.
 */
export function normalizeValue(value: unknown, fallback: (value: unknown) => RecordValue | undefined = () => undefined): RecordValue {
  const special = fallback(value)
  if (special !== undefined) return special

  if (value === null || value === undefined) return null
  if (typeof value === 'string' || typeof value === 'boolean') return value
  if (typeof value === 'number') return Number.isFinite(value) ? value : String(value)
  if (typeof value === 'bigint') return value.toString()
  if (value instanceof Date) return value.toISOString()
  if (Buffer.isBuffer(value)) return value.toString('base64')
  if (Array.isArray(value)) return value.map((v: unknown) => normalizeValue(v, fallback))
  if (typeof value === 'object' && isPlainObject(value)) {
    const out: { [key: string]: RecordValue } = {}
    for (const [k, v] of Object.entries(value)) {
      out[k] = normalizeValue(v, fallback)
    }
    return out
  }
  return String(value)
}

function isPlainObject(value: object): boolean {
  const proto: unknown = Object.getPrototypeOf(value)
  return proto === Object.prototype || proto === null
}
