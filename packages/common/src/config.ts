import { z } from 'zod'
import { ConfigError } from './errors.js'
import type { InvokerConfig, ProcessConfig } from './types/invoker.js'

export type Env = Readonly<Record<string, string | undefined>>

// --- Schema Building Blocks ---

/** `true`/`false`, or their string forms as they arrive from the environment. */
export const booleanFlag = z.union([z.boolean(), z.enum(['true', 'false']).transform((v) => v === 'true')])

export const positiveInteger = z.coerce.number().int().positive()

/** Seconds. 0 means wait indefinitely. */
export const timeoutSeconds = z.coerce.number().nonnegative()

// --- Environment Fallback ---

export function envVarName(prefix: string, key: string): string {
  return `${prefix}_${key.toUpperCase()}`
}

function isAbsent(value: unknown): boolean {
  return value === undefined || value === null || value === ''
}

/**
 * Pick `keys` from `config`, falling back to `<PREFIX>_<KEY>` in `env`
 * for every key the mapping does not carry.
 */
export function resolveConfigValues(
  config: InvokerConfig,
  prefix: string,
  keys: readonly string[],
  env: Env = process.env,
): Record<string, unknown> {
  const resolved: Record<string, unknown> = {}
  for (const key of keys) {
    const value = config[key]
    if (!isAbsent(value)) {
      resolved[key] = value
      continue
    }
    const fromEnv = env[envVarName(prefix, key)]
    if (!isAbsent(fromEnv)) {
      resolved[key] = fromEnv
    }
  }
  return resolved
}

// --- Adapter Config ---

export interface ReadInvokerConfigOptions<S extends z.AnyZodObject> {
  /** Invoker type name, used in error messages. */
  readonly type: string
  readonly envPrefix: string
  readonly schema: S
  readonly config: InvokerConfig
  readonly env?: Env | undefined
}

/**
 * Resolve an adapter's keys (config first, environment second) and validate them.
 * Throws `ConfigError` with `MISSING_KEY` for an absent required key, `INVALID_VALUE` otherwise.
 */
export function readInvokerConfig<S extends z.AnyZodObject>(options: ReadInvokerConfigOptions<S>): z.output<S> {
  const { type, envPrefix, schema } = options
  const raw = resolveConfigValues(options.config, envPrefix, Object.keys(schema.shape), options.env)
  const result = schema.safeParse(raw)
  if (result.success) return result.data

  const missing = result.error.issues.find((i) => i.code === 'invalid_type' && i.received === 'undefined')
  if (missing !== undefined) {
    const key = String(missing.path[0])
    const envVar = envVarName(envPrefix, key)
    throw new ConfigError('MISSING_KEY', `${type}: missing required key '${key}' (or environment variable ${envVar})`, {
      type,
      key,
      envVar,
    })
  }

  const issues = formatIssues(result.error)
  throw new ConfigError('INVALID_VALUE', `${type}: invalid configuration: ${issues.join('; ')}`, { type, issues })
}

// --- Process Config ---

const processConfigSchema = z.record(z.string(), z.record(z.string(), z.unknown()))

/** Validate process-wide defaults: a mapping of invoker type name to a mapping of adapter keys. */
export function parseProcessConfig(raw: unknown): ProcessConfig {
  if (raw === undefined || raw === null) return {}
  const result = processConfigSchema.safeParse(raw)
  if (!result.success) {
    const issues = formatIssues(result.error)
    throw new ConfigError('INVALID_CONFIG', `Invalid process configuration: ${issues.join('; ')}`, { issues })
  }
  return result.data
}

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((i) => (i.path.length > 0 ? `${i.path.join('.')}: ${i.message}` : i.message))
}
