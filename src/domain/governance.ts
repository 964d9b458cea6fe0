/**
 * Pool Governance
 *
 * Governance mode must be on, with its bounds set, before any tape in the
 * pool is locked. Order per pool: query, enable, minimum, maximum.
 */

import type { RetentionSettings } from '../types.js'
import { applianceCommands, GOVERNANCE_ENABLED_PHRASE, mtreePath } from '../remote/commands.js'
import { parseGovernanceStatus } from './parser.js'
import type { LockContext, PoolGovernanceState } from './types.js'

// ============================================================================
// Periods
// ============================================================================

function isPositiveInteger(value: number | undefined): value is number {
  return value !== undefined && Number.isInteger(value) && value > 0
}

/**
 * "<n><unit>" from the daily value, replaced by the monthly value when
 * that one is set too
 */
export function choosePeriod(
  daily: number | undefined,
  monthly: number | undefined,
  monthlyUnit: 'day' | 'year'
): string | undefined {
  let period: string | undefined
  if (isPositiveInteger(daily)) {
    period = `${daily}day`
  }
  if (isPositiveInteger(monthly)) {
    period = `${monthly}${monthlyUnit}`
  }
  return period
}

export function minimumPeriod(retention: RetentionSettings): string | undefined {
  return choosePeriod(retention.minDailyDays, retention.minMonthlyDays, 'day')
}

export function maximumPeriod(retention: RetentionSettings): string | undefined {
  return choosePeriod(retention.maxDailyDays, retention.maxMonthlyYears, 'year')
}

/** Lock applied to each tape */
export function tapeLockPeriod(retention: RetentionSettings): string | undefined {
  return choosePeriod(retention.tapeDailyDays, retention.tapeMonthlyYears, 'year')
}

// ============================================================================
// State machine
// ============================================================================

const DISABLED: PoolGovernanceState = { enabled: false, mode: 'none' }

/**
 * Read the pool's governance state. A failed query reads as disabled.
 */
export async function queryGovernance(ctx: LockContext): Promise<PoolGovernanceState> {
  const command = applianceCommands.governanceStatus(ctx.pool)
  ctx.logger.info({ pool: ctx.pool }, `[Executing Command]: ${command}`)

  const result = await ctx.executor.run(command)
  if (!result.ok) {
    ctx.logger.error({ pool: ctx.pool }, `Failed to read retention-lock status for MTREE ${mtreePath(ctx.pool)}`)
    return DISABLED
  }

  const state = parseGovernanceStatus(result.output)
  if (state.enabled) {
    ctx.logger.info({ pool: ctx.pool }, `Retention-lock feature is already enabled for MTREE ${mtreePath(ctx.pool)}`)
  } else {
    ctx.logger.info({ pool: ctx.pool, mode: state.mode }, `Retention-lock feature is not enabled for MTREE ${mtreePath(ctx.pool)}`)
  }
  return state
}

/**
 * Turn governance mode on. Succeeds only when the appliance confirms it.
 */
export async function enableGovernance(ctx: LockContext, state: PoolGovernanceState): Promise<PoolGovernanceState> {
  if (state.enabled) return state

  const command = applianceCommands.governanceEnable(ctx.pool)
  ctx.logger.info({ pool: ctx.pool }, `[Executing Command]: ${command}`)

  const result = await ctx.executor.run(command)
  if (result.ok && result.output.includes(GOVERNANCE_ENABLED_PHRASE)) {
    ctx.logger.info({ pool: ctx.pool }, `Retention-lock governance mode enabled for MTREE ${mtreePath(ctx.pool)}`)
    return { ...state, enabled: true, mode: 'governance' }
  }

  ctx.logger.error({ pool: ctx.pool }, `Failed to enable retention-lock for MTREE ${mtreePath(ctx.pool)}`)
  return state
}

type Bound = 'min' | 'max'

async function setBound(ctx: LockContext, state: PoolGovernanceState, bound: Bound): Promise<PoolGovernanceState> {
  if (!state.enabled) return state

  const label = bound === 'min' ? 'minimum' : 'maximum'
  const period = bound === 'min' ? minimumPeriod(ctx.settings.retention) : maximumPeriod(ctx.settings.retention)
  if (!period) {
    ctx.logger.info({ pool: ctx.pool }, `No ${label} retention-lock period configured for MTREE ${mtreePath(ctx.pool)}`)
    return state
  }

  const command = bound === 'min'
    ? applianceCommands.governanceSetMin(ctx.pool, period)
    : applianceCommands.governanceSetMax(ctx.pool, period)
  ctx.logger.info({ pool: ctx.pool }, `[Executing Command]: ${command}`)

  const result = await ctx.executor.run(command)
  if (!result.ok) {
    ctx.logger.error({ pool: ctx.pool, period }, `Failed to set ${label} retention period ${period} for MTREE ${mtreePath(ctx.pool)}`)
    return state
  }

  ctx.logger.info({ pool: ctx.pool, period }, `The ${label} retention period for MTREE ${mtreePath(ctx.pool)} is set to ${period}`)
  return bound === 'min' ? { ...state, minPeriod: period } : { ...state, maxPeriod: period }
}

export function setMinimumPeriod(ctx: LockContext, state: PoolGovernanceState): Promise<PoolGovernanceState> {
  return setBound(ctx, state, 'min')
}

export function setMaximumPeriod(ctx: LockContext, state: PoolGovernanceState): Promise<PoolGovernanceState> {
  return setBound(ctx, state, 'max')
}

/**
 * Enable, then set both bounds. Nothing is changed when no tape is eligible.
 */
export async function prepareGovernance(
  ctx: LockContext,
  state: PoolGovernanceState,
  eligibleCount: number
): Promise<PoolGovernanceState> {
  if (eligibleCount === 0) return state

  let next = await enableGovernance(ctx, state)
  next = await setMinimumPeriod(ctx, next)
  next = await setMaximumPeriod(ctx, next)
  return next
}
