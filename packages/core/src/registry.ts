import type { InvokerBuilder } from '@pipeline-invokers/common'
import { ConfigError } from '@pipeline-invokers/common'

/**
 * Type name → builder mapping.
 *
 * Append-only: a name can be registered once and never removed or replaced.
 */
export class InvokerRegistry {
  private readonly entries = new Map<string, InvokerBuilder>()

  constructor(builtins: Readonly<Record<string, InvokerBuilder>> = {}) {
    for (const [name, builder] of Object.entries(builtins)) {
      this.register(name, builder)
    }
  }

  register(name: string, builder: InvokerBuilder): void {
    if (this.entries.has(name)) {
      throw new ConfigError('ALREADY_REGISTERED', `'${name}' is already registered`, { type: name })
    }
    this.entries.set(name, builder)
  }

  resolve(name: string): InvokerBuilder {
    const builder = this.entries.get(name)
    if (builder === undefined) {
      throw new ConfigError('UNKNOWN_TYPE', `Unknown invoker type: ${name}`, { type: name })
    }
    return builder
  }

  has(name: string): boolean {
    return this.entries.has(name)
  }

  names(): string[] {
    return [...this.entries.keys()]
  }
}
