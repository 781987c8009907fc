// Bounded query execution
export type { BoundedQueryOptions, BoundedRows, QueryCursor, QueryOpener } from './boundedQuery.js'
export { collectBounded, createBoundedQueryInvoker, executeBoundedQuery, queryHash } from './boundedQuery.js'
// Configuration
export type { Env, ReadInvokerConfigOptions } from './config.js'
export {
  booleanFlag,
  envVarName,
  parseProcessConfig,
  positiveInteger,
  readInvokerConfig,
  resolveConfigValues,
  timeoutSeconds,
} from './config.js'
// Errors
export type {
  ConfigErrorCode,
  ConfigErrorDetails,
  ConnectionErrorDetails,
  InputErrorCode,
  PoolErrorCode,
} from './errors.js'
export {
  ConfigError,
  ConnectionError,
  InputError,
  InvocationError,
  InvokerError,
  PoolError,
  toError,
} from './errors.js'
// Logging
export type { Logger } from './logger.js'
export { makeLogger, makeNoopLogger } from './logger.js'
// Query results
export type { QueryResult, RecordValue } from './queryResult.js'
export { normalizeValue, parseQueryResult, queryFailed, querySucceeded, serializeQueryResult } from './queryResult.js'
// Shared clients
export { SharedClientProvider } from './sharedClient.js'
// Contract types
export type { Invoker, InvokerBuilder, InvokerConfig, ProcessConfig, StepConfig } from './types/invoker.js'
