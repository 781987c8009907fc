import type { Invoker, InvokerBuilder, InvokerConfig, Logger, ProcessConfig, StepConfig } from '@pipeline-invokers/common'
import { ConfigError, makeLogger, parseProcessConfig, PoolError } from '@pipeline-invokers/common'
import { InvokerPool } from './pool.js'
import type { InvokerRegistry } from './registry.js'

// ── Types ──────────────────────────────────────────────────────

export interface InvokerFactoryOptions {
  readonly registry: InvokerRegistry
  /** Process-wide defaults, keyed by invoker type name. */
  readonly config?: unknown
  readonly logger?: Logger | undefined
}

export interface EffectiveConfig {
  readonly type: string
  readonly config: InvokerConfig
}

// ── Factory ────────────────────────────────────────────────────

/**
 * Resolves step configurations against a registry and builds invokers.
 *
 * The configuration passed to a builder is the process-wide defaults for its
 * type overlaid with the step's own keys. The overlay is shallow: a step key
 * replaces the default of the same name whole, nested mappings included.
 */
export class InvokerFactory {
  private readonly registry: InvokerRegistry
  private readonly config: ProcessConfig
  private readonly log: Logger

  constructor(options: InvokerFactoryOptions) {
    this.registry = options.registry
    this.config = parseProcessConfig(options.config)
    this.log = options.logger ?? makeLogger({ component: 'invoker-factory' })
  }

  /** Register a custom invoker type. It becomes usable in any step configuration. */
  register(name: string, builder: InvokerBuilder): void {
    this.registry.register(name, builder)
    this.log.debug({ type: name }, 'registered invoker type')
  }

  effectiveConfig(stepConfig: StepConfig): EffectiveConfig {
    const type = stepConfig.type
    if (typeof type !== 'string' || type.length === 0) {
      throw new ConfigError('INVALID_CONFIG', `Invalid invoker config: missing 'type' in ${describeKeys(stepConfig)}`, {
        key: 'type',
      })
    }
    const defaults = this.config[type] ?? {}
    return { type, config: { ...defaults, ...stepConfig } }
  }

  async createInvoker(stepConfig: StepConfig): Promise<Invoker> {
    const { type, config } = this.effectiveConfig(stepConfig)
    const builder = this.registry.resolve(type)
    this.log.debug({ type, keys: Object.keys(config) }, 'creating invoker')
    return builder(config)
  }

  /**
   * Build `size` identically configured invokers into a pool.
   * The first construction failure propagates; no partial pool is returned.
   */
  async createInvokerPool(size: number, stepConfig: StepConfig): Promise<InvokerPool> {
    if (!Number.isInteger(size) || size <= 0) {
      throw new PoolError('INVALID_POOL_SIZE', `Should not create invoker pool of size ${size}`)
    }
    const { type, config } = this.effectiveConfig(stepConfig)
    const builder = this.registry.resolve(type)

    const invokers: Invoker[] = []
    for (let i = 0; i < size; i++) {
      invokers.push(await builder(config))
    }
    this.log.info({ type, size }, 'created invoker pool')
    return new InvokerPool(invokers)
  }
}

function describeKeys(config: StepConfig): string {
  const keys = Object.keys(config)
  return keys.length === 0 ? '{}' : `{ ${keys.join(', ')} }`
}
