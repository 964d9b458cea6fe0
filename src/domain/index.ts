/**
 * Tapekeeper Domain Layer
 *
 * - parser: appliance text reports to records
 * - eligibility: lock and reclaim selection rules
 * - governance: pool-level retention-lock setup
 * - lock / reclaim: per-tape transitions
 * - workflows: per instance, per pool orchestration
 */

// Types
export type {
  TimestampKind,
  TapeRecord,
  PlacementRecord,
  GovernanceMode,
  PoolGovernanceState,
  PipelineStage,
  PipelineOutcome,
  ReclaimBatchResult,
  LockOutcome,
  ProbeContext,
  RunContext,
  LockContext,
  ReclaimContext
} from './types.js'

export {
  NO_RETENTION,
  LOCKED_STATE,
  LOCK_MARKER,
  PIPELINE_STAGES
} from './types.js'

// Parser
export {
  splitCells,
  splitTabCells,
  parseTapeListing,
  parsePlacementReport,
  parseOptionTable,
  parseGovernanceStatus,
  parsePoolNames
} from './parser.js'

// Eligibility
export {
  isLoaded,
  isCurrentlyLocked,
  notAlreadyLocked,
  isUsageEligible,
  isModifiedOn,
  isRetentionExpired,
  isLockEligible,
  isReclaimEligible,
  selectTapesForLock,
  selectTapesForReclaim,
  usedAmount,
  slotNumber,
  libraryName
} from './eligibility.js'

export type { LockCriteria } from './eligibility.js'

// Appliance
export {
  checkApplianceHealth,
  discoverPools,
  fetchTapeListing,
  fetchTape,
  fetchPlacementReport
} from './appliance.js'

// Governance
export {
  choosePeriod,
  minimumPeriod,
  maximumPeriod,
  tapeLockPeriod,
  queryGovernance,
  enableGovernance,
  setMinimumPeriod,
  setMaximumPeriod,
  prepareGovernance
} from './governance.js'

// Transitions
export { lockTape, lockTapes } from './lock.js'
export { reclaimTape, reclaimTapes } from './reclaim.js'

// Results
export { reportResults } from './results.js'
export type { ResultReport } from './results.js'

// Workflows
export { runLockWorkflow, runReclaimWorkflow } from './workflows.js'

export type {
  WorkflowEnvironment,
  LockEnvironment,
  ReclaimEnvironment,
  LockPoolSummary,
  ReclaimPoolSummary,
  WorkflowSummary
} from './workflows.js'
