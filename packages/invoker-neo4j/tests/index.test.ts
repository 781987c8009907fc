import type { RecordValue } from '@pipeline-invokers/common'
import {
  ConfigError,
  ConnectionError,
  makeNoopLogger,
  parseQueryResult,
  SharedClientProvider,
} from '@pipeline-invokers/common'
import { describeBoundedQueryContract } from '@pipeline-invokers/contract'
import type { Driver } from 'neo4j-driver'
import { int, Node } from 'neo4j-driver'
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import { createNeo4jInvoker } from '../src/index.js'

// ── Mock neo4j-driver ──────────────────────────────────────────

const mockOpenDriver = vi.fn()
const mockVerify = vi.fn()
const mockDriverClose = vi.fn()
const mockSession = vi.fn()
const mockRun = vi.fn()
const mockSessionClose = vi.fn()

vi.mock('neo4j-driver', async (importOriginal) => {
  const actual = await importOriginal<typeof import('neo4j-driver')>()
  return { ...actual, driver: (...args: unknown[]) => mockOpenDriver(...args) }
})

let pulled = 0

/** Result double: `keys()` plus async iteration over records, counting every record handed out. */
function fakeResult(headers: string[], rows: unknown[][]) {
  return {
    keys: async () => headers,
    async *[Symbol.asyncIterator]() {
      for (const row of rows) {
        pulled++
        yield { keys: headers, get: (i: number) => row[i] }
      }
    },
  }
}

function failingResult(error: Error) {
  return {
    keys: () => Promise.reject(error),
  }
}

// ── Fixtures ───────────────────────────────────────────────────

const baseConfig = {
  database_uri: 'bolt://graph.test:7687',
  username: 'neo4j',
  password: 'test-secret',
}

function freshDrivers(): SharedClientProvider<Driver> {
  return new SharedClientProvider<Driver>((d) => d.close())
}

const logger = makeNoopLogger()

beforeEach(() => {
  pulled = 0
  mockVerify.mockResolvedValue({})
  mockDriverClose.mockResolvedValue(undefined)
  mockSessionClose.mockResolvedValue(undefined)
  mockSession.mockImplementation(() => ({ run: mockRun, close: mockSessionClose }))
  mockOpenDriver.mockImplementation(() => ({
    verifyConnectivity: mockVerify,
    session: mockSession,
    close: mockDriverClose,
  }))
  mockRun.mockReturnValue(fakeResult(['n'], [[1]]))
})

afterEach(() => {
  vi.clearAllMocks()
})

// ── Contract ───────────────────────────────────────────────────

describeBoundedQueryContract('neo4j', {
  query: 'MATCH (p:Person) RETURN p.id AS id, p.name AS name',
  async withRows({ headers, rows, limit }) {
    mockRun.mockReturnValue(fakeResult(headers, rows))
    return createNeo4jInvoker({ ...baseConfig, limit }, { drivers: freshDrivers(), logger, env: {} })
  },
  async withFailure(error) {
    mockRun.mockReturnValue(failingResult(error))
    return createNeo4jInvoker(baseConfig, { drivers: freshDrivers(), logger, env: {} })
  },
})

// ── Tests ──────────────────────────────────────────────────────

describe('invoker-neo4j', () => {
  describe('shared driver', () => {
    it('creates and verifies the driver once per process', async () => {
      const drivers = freshDrivers()
      await createNeo4jInvoker(baseConfig, { drivers, logger, env: {} })
      await createNeo4jInvoker({ ...baseConfig, limit: 5 }, { drivers, logger, env: {} })

      expect(mockOpenDriver).toHaveBeenCalledTimes(1)
      expect(mockVerify).toHaveBeenCalledTimes(1)
      expect(mockOpenDriver.mock.calls[0]?.[0]).toBe('bolt://graph.test:7687')
    })

    it('concurrent first constructions share one initialization', async () => {
      const drivers = freshDrivers()
      await Promise.all([
        createNeo4jInvoker(baseConfig, { drivers, logger, env: {} }),
        createNeo4jInvoker(baseConfig, { drivers, logger, env: {} }),
        createNeo4jInvoker(baseConfig, { drivers, logger, env: {} }),
      ])
      expect(mockOpenDriver).toHaveBeenCalledTimes(1)
      expect(mockVerify).toHaveBeenCalledTimes(1)
    })

    it('a different server gets its own driver', async () => {
      const drivers = freshDrivers()
      await createNeo4jInvoker(baseConfig, { drivers, logger, env: {} })
      await createNeo4jInvoker({ ...baseConfig, database_uri: 'bolt://other.test:7687' }, { drivers, logger, env: {} })
      expect(mockOpenDriver).toHaveBeenCalledTimes(2)
      expect(drivers.size).toBe(2)
    })

    it('connectivity failure is thrown from construction and closes the driver', async () => {
      mockVerify.mockRejectedValueOnce(new Error('ServiceUnavailable'))
      const drivers = freshDrivers()

      await expect(createNeo4jInvoker(baseConfig, { drivers, logger, env: {} })).rejects.toThrow(ConnectionError)
      expect(mockDriverClose).toHaveBeenCalledTimes(1)
      expect(drivers.has('bolt://graph.test:7687|neo4j')).toBe(false)
    })

    it('retries driver creation after a failed verification', async () => {
      mockVerify.mockRejectedValueOnce(new Error('ServiceUnavailable'))
      const drivers = freshDrivers()

      await expect(createNeo4jInvoker(baseConfig, { drivers, logger, env: {} })).rejects.toMatchObject({
        code: 'CONNECTION_FAILED',
        details: { type: 'neo4j', endpoint: 'bolt://graph.test:7687' },
      })
      await createNeo4jInvoker(baseConfig, { drivers, logger, env: {} })
      expect(mockOpenDriver).toHaveBeenCalledTimes(2)
      expect(mockVerify).toHaveBeenCalledTimes(2)
    })
  })

  describe('configuration', () => {
    it('missing password fails before any driver is created', async () => {
      const { password: _password, ...withoutPassword } = baseConfig
      await expect(
        createNeo4jInvoker(withoutPassword, { drivers: freshDrivers(), logger, env: {} }),
      ).rejects.toMatchObject({
        code: 'MISSING_KEY',
        details: { type: 'neo4j', key: 'password', envVar: 'NEO4J_PASSWORD' },
      })
      expect(mockOpenDriver).not.toHaveBeenCalled()
    })

    it('non-numeric limit is an invalid value', async () => {
      await expect(
        createNeo4jInvoker({ ...baseConfig, limit: 'lots' }, { drivers: freshDrivers(), logger, env: {} }),
      ).rejects.toBeInstanceOf(ConfigError)
    })

    it('falls back to NEO4J_* environment variables', async () => {
      const env = {
        NEO4J_DATABASE_URI: 'bolt://env.test:7687',
        NEO4J_USERNAME: 'reader',
        NEO4J_PASSWORD: 'test-secret',
        NEO4J_LIMIT: '2',
        NEO4J_QUERY_TIMEOUT: '5',
        NEO4J_WRITE_QUERIES: 'true',
      }
      mockRun.mockReturnValue(fakeResult(['n'], [[1], [2], [3]]))

      const invoker = await createNeo4jInvoker({}, { drivers: freshDrivers(), logger, env })
      const result = parseQueryResult(await invoker.invoke('MATCH (n) RETURN n'))

      expect(mockOpenDriver.mock.calls[0]?.[0]).toBe('bolt://env.test:7687')
      expect(mockSession).toHaveBeenCalledWith({ defaultAccessMode: 'WRITE' })
      expect(mockRun).toHaveBeenCalledWith('MATCH (n) RETURN n', {}, { timeout: 5000 })
      expect(result.records).toEqual([[1], [2]])
      expect(result.hasMore).toBe(true)
    })

    it('step values win over environment variables', async () => {
      const env = { NEO4J_LIMIT: '2' }
      mockRun.mockReturnValue(fakeResult(['n'], [[1], [2], [3]]))

      const invoker = await createNeo4jInvoker({ ...baseConfig, limit: 3 }, { drivers: freshDrivers(), logger, env })
      const result = parseQueryResult(await invoker.invoke('MATCH (n) RETURN n'))
      expect(result.records).toHaveLength(3)
      expect(result.hasMore).toBe(false)
    })

    it('defaults to read sessions with the server timeout', async () => {
      const invoker = await createNeo4jInvoker(baseConfig, { drivers: freshDrivers(), logger, env: {} })
      await invoker.invoke('RETURN 1 AS n')

      expect(mockSession).toHaveBeenCalledWith({ defaultAccessMode: 'READ' })
      expect(mockRun).toHaveBeenCalledWith('RETURN 1 AS n', {}, undefined)
    })

    it('passes database name and a zero timeout through', async () => {
      const invoker = await createNeo4jInvoker(
        { ...baseConfig, database_name: 'movies', query_timeout: 0 },
        { drivers: freshDrivers(), logger, env: {} },
      )
      await invoker.invoke('RETURN 1 AS n')

      expect(mockSession).toHaveBeenCalledWith({ defaultAccessMode: 'READ', database: 'movies' })
      expect(mockRun).toHaveBeenCalledWith('RETURN 1 AS n', {}, { timeout: 0 })
    })
  })

  describe('invocation', () => {
    it('stops reading after the peeked record', async () => {
      const rows = Array.from({ length: 50 }, (_, i) => [i])
      mockRun.mockReturnValue(fakeResult(['n'], rows))

      const invoker = await createNeo4jInvoker({ ...baseConfig, limit: 3 }, { drivers: freshDrivers(), logger, env: {} })
      await invoker.invoke('MATCH (n) RETURN n')
      expect(pulled).toBe(4)
    })

    it('closes the session after success and after failure', async () => {
      const invoker = await createNeo4jInvoker(baseConfig, { drivers: freshDrivers(), logger, env: {} })
      await invoker.invoke('RETURN 1 AS n')
      mockRun.mockReturnValue(failingResult(new Error('Neo.ClientError.Statement.SyntaxError')))
      await invoker.invoke('RETURN')

      expect(mockSessionClose).toHaveBeenCalledTimes(2)
    })

    it('normalizes graph values', async () => {
      const person = new Node(int(1), ['Person'], { name: 'Ada', born: int(1815) })
      const rows: unknown[][] = [[int(42), int('9007199254740993'), person, ['a', int(2)]]]
      mockRun.mockReturnValue(fakeResult(['small', 'big', 'person', 'list'], rows))

      const invoker = await createNeo4jInvoker(baseConfig, { drivers: freshDrivers(), logger, env: {} })
      const result = parseQueryResult(await invoker.invoke('MATCH (p) RETURN p'))

      const expected: RecordValue[][] = [[42, '9007199254740993', { name: 'Ada', born: 1815 }, ['a', 2]]]
      expect(result.records).toEqual(expected)
    })

    it('session failure is returned as data', async () => {
      mockSession.mockImplementationOnce(() => {
        throw new Error('Pool is closed')
      })
      const invoker = await createNeo4jInvoker(baseConfig, { drivers: freshDrivers(), logger, env: {} })
      const output = await invoker.invoke('RETURN 1')
      expect(output).toBe('{"headers":[],"records":[],"has_more":false,"error":"Pool is closed"}')
    })
  })
})
