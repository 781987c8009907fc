// --- Configuration ---

/** Adapter configuration: a flat mapping of keys to scalar or structured values. */
export type InvokerConfig = Readonly<Record<string, unknown>>

/** Process-wide defaults, keyed by invoker type name. */
export type ProcessConfig = Readonly<Record<string, InvokerConfig>>

/**
 * Configuration block of a pipeline step. Must carry a `type` naming a
 * registered invoker; every other key is adapter-specific.
 */
export type StepConfig = InvokerConfig

// --- Invoker (implemented by adapter packages) ---

/**
 * A capability a pipeline step can call.
 *
 * `invoke()` is one request/response over text. Implementations keep no
 * cross-call state that changes this contract; reusing a client connection
 * between calls is fine. Each adapter documents whether failures are thrown
 * or returned as data.
 */
export interface Invoker {
  invoke(input: string): Promise<string>
}

/** Builds an invoker from its effective configuration. Registered under a type name. */
export type InvokerBuilder = (config: InvokerConfig) => Invoker | Promise<Invoker>
