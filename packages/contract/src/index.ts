// Contract test suites

export type { BoundedQueryHarness, SeededRows } from './boundedQueryContract.js'
export { describeBoundedQueryContract } from './boundedQueryContract.js'
