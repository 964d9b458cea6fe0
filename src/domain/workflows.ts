/**
 * Workflows
 *
 * Per instance, then per pool. Instances and pools run one after another;
 * a failure in one never stops the next.
 */

import type { LockSettings, ReclaimSettings, Settings, Workflow } from '../types.js'
import type { Logger } from '../lib/logger.js'
import type { ConsistencyPolicy } from '../lib/consistency.js'
import type { ReportSink } from '../lib/report-writer.js'
import { errorMessage } from '../lib/errors.js'
import type { CommandExecutor } from '../remote/executor.js'
import type { CatalogClient } from '../remote/catalog.js'
import { checkApplianceHealth, discoverPools, fetchPlacementReport, fetchTapeListing } from './appliance.js'
import { selectTapesForLock, selectTapesForReclaim } from './eligibility.js'
import { prepareGovernance, queryGovernance } from './governance.js'
import { lockTapes } from './lock.js'
import { reclaimTapes } from './reclaim.js'
import { reportResults, type ResultReport } from './results.js'
import type {
  LockContext,
  LockOutcome,
  PoolGovernanceState,
  ProbeContext,
  ReclaimBatchResult,
  ReclaimContext,
  TapeRecord
} from './types.js'

// ============================================================================
// Types
// ============================================================================

export interface WorkflowEnvironment<S extends Settings> {
  settings: S
  logger: Logger
  /** Executor for one appliance */
  connect: (instance: string) => CommandExecutor
  consistency: ConsistencyPolicy
  reports: ReportSink
  now?: () => Date
  /** Stop after classification */
  dryRun?: boolean
}

export type LockEnvironment = WorkflowEnvironment<LockSettings>

export interface ReclaimEnvironment extends WorkflowEnvironment<ReclaimSettings> {
  catalog: CatalogClient
}

export interface LockPoolSummary {
  instance: string
  pool: string
  selected: string[]
  governance: PoolGovernanceState
  outcomes: LockOutcome[]
  report?: ResultReport
}

export interface ReclaimPoolSummary {
  instance: string
  pool: string
  selected: string[]
  result?: ReclaimBatchResult
  report?: ResultReport
}

export interface WorkflowSummary<P> {
  workflow: Workflow
  dryRun: boolean
  /** Instances that failed the health check */
  skippedInstances: string[]
  pools: P[]
  errors: Array<{ instance: string; pool?: string; error: string }>
}

// ============================================================================
// Shared
// ============================================================================

function barcodes(records: TapeRecord[]): string[] {
  return records.map(record => record.barcode)
}

async function forEachHealthyInstance<S extends Settings, P>(
  env: WorkflowEnvironment<S>,
  summary: WorkflowSummary<P>,
  visit: (probe: ProbeContext) => Promise<void>
): Promise<void> {
  for (const instance of env.settings.instances) {
    const logger = env.logger.child({ instance })
    const probe: ProbeContext = { instance, executor: env.connect(instance), logger }

    try {
      if (!(await checkApplianceHealth(probe))) {
        summary.skippedInstances.push(instance)
        continue
      }
      await visit(probe)
    } catch (err) {
      logger.error({ err: errorMessage(err) }, `Processing of ${instance} stopped: ${errorMessage(err)}`)
      summary.errors.push({ instance, error: errorMessage(err) })
    }
  }
}

async function guardPool<P>(
  summary: WorkflowSummary<P>,
  probe: ProbeContext,
  pool: string,
  run: () => Promise<P>
): Promise<void> {
  try {
    summary.pools.push(await run())
  } catch (err) {
    probe.logger.error({ pool, err: errorMessage(err) }, `Processing of Pool: ${pool} stopped: ${errorMessage(err)}`)
    summary.errors.push({ instance: probe.instance, pool, error: errorMessage(err) })
  }
}

function emptySummary<P>(workflow: Workflow, dryRun: boolean): WorkflowSummary<P> {
  return { workflow, dryRun, skippedInstances: [], pools: [], errors: [] }
}

// ============================================================================
// Lock
// ============================================================================

async function lockPool(ctx: LockContext, dryRun: boolean): Promise<LockPoolSummary> {
  const { settings, logger, pool } = ctx

  logger.info(
    { pool, mechanism: settings.mechanism, minimumUsage: settings.minimumTapeUsage },
    `Processing Pool: ${pool} with Mechanism #${settings.mechanism}`
  )

  const governance = await queryGovernance(ctx)
  const placements = await fetchPlacementReport(ctx, pool)
  const listing = await fetchTapeListing(ctx, pool, 'modification')

  const selected = selectTapesForLock(
    listing,
    { placements, minimumUsage: settings.minimumTapeUsage, mechanism: settings.mechanism, now: ctx.now() },
    logger
  )
  const summary: LockPoolSummary = {
    instance: ctx.instance,
    pool,
    selected: barcodes(selected),
    governance,
    outcomes: []
  }

  if (selected.length === 0) {
    logger.info({ pool }, 'No Tapes are available')
    return summary
  }

  logger.info({ pool, tapes: selected }, `Tapes eligible for retention lock: ${summary.selected.join(', ')}`)
  if (dryRun) return summary

  const prepared = await prepareGovernance(ctx, governance, selected.length)
  const outcomes = await lockTapes(ctx, selected, prepared)

  return {
    ...summary,
    governance: prepared,
    outcomes,
    report: outcomes.length > 0
      ? await reportResults(ctx, 'lock', outcomes.filter(outcome => outcome.locked).map(outcome => outcome.barcode))
      : undefined
  }
}

/**
 * Lock freshly written tapes in every configured pool of every instance
 */
export async function runLockWorkflow(env: LockEnvironment): Promise<WorkflowSummary<LockPoolSummary>> {
  const dryRun = env.dryRun ?? false
  const now = env.now ?? (() => new Date())
  const summary = emptySummary<LockPoolSummary>('lock', dryRun)

  await forEachHealthyInstance(env, summary, async probe => {
    for (const pool of env.settings.pools) {
      const ctx: LockContext = {
        ...probe,
        logger: probe.logger.child({ pool }),
        pool,
        settings: env.settings,
        consistency: env.consistency,
        reports: env.reports,
        now
      }
      await guardPool(summary, probe, pool, () => lockPool(ctx, dryRun))
    }
  })

  return summary
}

// ============================================================================
// Reclaim
// ============================================================================

async function reclaimPool(ctx: ReclaimContext, dryRun: boolean): Promise<ReclaimPoolSummary> {
  const { logger, pool } = ctx

  const listing = await fetchTapeListing(ctx, pool, 'retention')
  const selected = selectTapesForReclaim(listing, ctx.now(), logger)
  const summary: ReclaimPoolSummary = { instance: ctx.instance, pool, selected: barcodes(selected) }

  logger.info({ pool, tapes: selected }, 'Listing Retention Lock expired tapes')
  if (dryRun) return summary

  const result = await reclaimTapes(ctx, selected)
  return {
    ...summary,
    result,
    report: result.succeeded.length > 0
      ? await reportResults(ctx, 'reclaim', result.succeeded)
      : undefined
  }
}

/**
 * Reclaim expired tapes in every configured pool found on each instance
 */
export async function runReclaimWorkflow(env: ReclaimEnvironment): Promise<WorkflowSummary<ReclaimPoolSummary>> {
  const dryRun = env.dryRun ?? false
  const now = env.now ?? (() => new Date())
  const summary = emptySummary<ReclaimPoolSummary>('reclaim', dryRun)

  await forEachHealthyInstance(env, summary, async probe => {
    const pools = await discoverPools(probe, env.settings.pools)

    for (const pool of pools) {
      const ctx: ReclaimContext = {
        ...probe,
        logger: probe.logger.child({ pool }),
        pool,
        settings: env.settings,
        consistency: env.consistency,
        reports: env.reports,
        catalog: env.catalog,
        now
      }
      await guardPool(summary, probe, pool, () => reclaimPool(ctx, dryRun))
    }
  })

  return summary
}
