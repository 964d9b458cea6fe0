/**
 * Tapekeeper Domain Types
 *
 * Records parsed from appliance reports, per-run outcomes and the run
 * context threaded through every stage.
 */

import type { LockSettings, ReclaimSettings, Settings } from '../types.js'
import type { Logger } from '../lib/logger.js'
import type { ConsistencyPolicy } from '../lib/consistency.js'
import type { ReportSink } from '../lib/report-writer.js'
import type { CommandExecutor } from '../remote/executor.js'
import type { CatalogClient } from '../remote/catalog.js'

// ============================================================================
// Records
// ============================================================================

/**
 * Which time column a tape listing carries
 * - modification: last write time
 * - retention: retention-lock expiry, or "n/a" when no lock is set
 */
export type TimestampKind = 'modification' | 'retention'

/** Retention column value for a tape without a lock */
export const NO_RETENTION = 'n/a'

/** State of a tape once its retention lock has been applied */
export const LOCKED_STATE = 'RO/RL*'

/** Substring of `state` present while a lock is active */
export const LOCK_MARKER = 'RL'

export interface TapeRecord {
  readonly barcode: string
  readonly poolName: string
  /** e.g. "Pool_TEST slot 667" or "vault" */
  readonly location: string
  readonly state: string
  /** e.g. "5 GiB" */
  readonly size: string
  readonly used: string
  readonly compression: string
  readonly timestampKind: TimestampKind
  /** Raw appliance time, "YYYY/MM/DD HH:MM:SS" or "n/a" */
  readonly timestamp: string
}

export interface PlacementRecord {
  /** Backing file path; contains the barcode */
  readonly fileName: string
  readonly tier: string
  readonly size: string
  readonly placementTime: string
}

// ============================================================================
// Governance
// ============================================================================

export type GovernanceMode = 'none' | 'governance' | 'other'

export interface PoolGovernanceState {
  readonly enabled: boolean
  readonly mode: GovernanceMode
  readonly minPeriod?: string
  readonly maxPeriod?: string
}

// ============================================================================
// Outcomes
// ============================================================================

export type PipelineStage = 'catalog-delete' | 'export' | 'remove' | 'create' | 'import' | 'label'

export const PIPELINE_STAGES: readonly PipelineStage[] = [
  'catalog-delete',
  'export',
  'remove',
  'create',
  'import',
  'label'
]

export type PipelineOutcome =
  | { status: 'succeeded'; barcode: string }
  | { status: 'failed'; barcode: string; stage: PipelineStage }

export interface ReclaimBatchResult {
  readonly outcomes: PipelineOutcome[]
  /** Barcodes that reached the label stage */
  readonly succeeded: string[]
  /** Tapes grouped by the stage that stopped them */
  readonly failed: Record<PipelineStage, TapeRecord[]>
}

export interface LockOutcome {
  readonly barcode: string
  readonly locked: boolean
  readonly reason?: string
}

// ============================================================================
// Run context
// ============================================================================

/**
 * What instance-level probes need
 */
export interface ProbeContext {
  readonly instance: string
  readonly executor: CommandExecutor
  readonly logger: Logger
}

/**
 * Per-pool context, created once and never mutated
 */
export interface RunContext<S extends Settings = Settings> extends ProbeContext {
  readonly pool: string
  readonly settings: S
  readonly consistency: ConsistencyPolicy
  readonly reports: ReportSink
  readonly now: () => Date
}

export type LockContext = RunContext<LockSettings>

export interface ReclaimContext extends RunContext<ReclaimSettings> {
  readonly catalog: CatalogClient
}
