import type { Invoker, InvokerBuilder } from '@pipeline-invokers/common'

/** Returns its input unchanged. Takes no configuration. */
export function createVerbatimInvoker(): Invoker {
  return {
    invoke: async (input: string) => input,
  }
}

export const verbatimBuilder: InvokerBuilder = () => createVerbatimInvoker()
