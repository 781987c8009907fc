import { readFile } from 'node:fs/promises'
import type { Env, InvokerBuilder, Logger, ProcessConfig } from '@pipeline-invokers/common'
import { ConfigError, parseProcessConfig, toError } from '@pipeline-invokers/common'
import { InvokerFactory, InvokerRegistry, verbatimBuilder } from '@pipeline-invokers/core'
import { neo4jBuilder, neo4jDrivers } from '@pipeline-invokers/invoker-neo4j'
import { azureOpenAIChatBuilder, azureOpenAIChatJsonBuilder } from '@pipeline-invokers/invoker-openai'
import { postgresBuilder, postgresPools } from '@pipeline-invokers/invoker-postgres'
import { trinoBuilder, trinoClients } from '@pipeline-invokers/invoker-trino'

// ── Types ──────────────────────────────────────────────────────

export interface StandardRegistryOptions {
  /** Environment for adapter key fallback. Defaults to `process.env`. */
  readonly env?: Env | undefined
  readonly logger?: Logger | undefined
}

export interface StandardFactoryOptions extends StandardRegistryOptions {
  /** Process-wide defaults, keyed by invoker type name. */
  readonly config?: unknown
  readonly registry?: InvokerRegistry | undefined
}

// ── Registry ───────────────────────────────────────────────────

export function standardBuilders(options: StandardRegistryOptions = {}): Record<string, InvokerBuilder> {
  const adapterOptions = {
    env: options.env,
    logger: options.logger?.child({ component: 'invoker' }),
  }
  return {
    verbatim: verbatimBuilder,
    neo4j: neo4jBuilder(adapterOptions),
    postgres: postgresBuilder(adapterOptions),
    trino: trinoBuilder(adapterOptions),
    azure_openai_chat: azureOpenAIChatBuilder(adapterOptions),
    azure_openai_chat_json: azureOpenAIChatJsonBuilder(adapterOptions),
  }
}

/** Registry pre-populated with every built-in invoker type. */
export function createStandardRegistry(options: StandardRegistryOptions = {}): InvokerRegistry {
  return new InvokerRegistry(standardBuilders(options))
}

/** Factory over the standard registry (or `options.registry`) and the given process defaults. */
export function createStandardFactory(options: StandardFactoryOptions = {}): InvokerFactory {
  return new InvokerFactory({
    registry: options.registry ?? createStandardRegistry(options),
    config: options.config,
    logger: options.logger,
  })
}

// ── Process Config ─────────────────────────────────────────────

/** Read process-wide defaults from a JSON file. */
export async function loadProcessConfig(path: string): Promise<ProcessConfig> {
  const text = await readFile(path, 'utf-8')
  let raw: unknown
  try {
    raw = JSON.parse(text)
  } catch (err) {
    throw new ConfigError('INVALID_CONFIG', `Invalid process configuration in ${path}: ${toError(err).message}`)
  }
  return parseProcessConfig(raw)
}

// ── Teardown ───────────────────────────────────────────────────

/** Close every process-wide driver, pool and client the built-in adapters opened. */
export async function closeSharedClients(): Promise<void> {
  await Promise.all([neo4jDrivers.closeAll(), postgresPools.closeAll(), trinoClients.closeAll()])
}
