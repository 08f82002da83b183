export type { BatchOperationKind } from './batch-limits.js'
export {
  BATCH_LIMITS,
  isBatchOperationKind,
  isValid,
  limitFor,
} from './batch-limits.js'
export { planChunks, planChunksFor } from './chunk-plan.js'
