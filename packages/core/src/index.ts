// Re-export contract types from common package
export type {
  Invoker,
  InvokerBuilder,
  InvokerConfig,
  Logger,
  ProcessConfig,
  QueryResult,
  RecordValue,
  StepConfig,
} from '@pipeline-invokers/common'
// Re-export error classes
export {
  ConfigError,
  ConnectionError,
  InputError,
  InvocationError,
  InvokerError,
  PoolError,
} from '@pipeline-invokers/common'
// Factory
export type { EffectiveConfig, InvokerFactoryOptions } from './factory.js'
export { InvokerFactory } from './factory.js'
// Built-in invokers
export { createVerbatimInvoker, verbatimBuilder } from './invokers/verbatim.js'
// Pool
export { InvokerPool } from './pool.js'
// Registry
export { InvokerRegistry } from './registry.js'
