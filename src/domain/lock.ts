/**
 * Lock-Apply Transition
 *
 * Sets a retention lock on each selected tape and confirms it by
 * re-reading the tape.
 */

import { applianceCommands } from '../remote/commands.js'
import { fetchTape } from './appliance.js'
import { tapeLockPeriod } from './governance.js'
import { LOCKED_STATE, type LockContext, type LockOutcome, type PoolGovernanceState, type TapeRecord } from './types.js'

export async function lockTape(ctx: LockContext, record: TapeRecord): Promise<LockOutcome> {
  const { barcode, poolName } = record
  const period = tapeLockPeriod(ctx.settings.retention)

  if (!period) {
    ctx.logger.error({ barcode }, `No retention-lock period configured for Barcode: ${barcode}`)
    return { barcode, locked: false, reason: 'no retention-lock period configured' }
  }

  ctx.logger.info({ barcode, pool: poolName }, `Setting Retention Lock on Barcode: ${barcode} in Pool: ${poolName} to ${period}.`)
  const command = applianceCommands.lockTape(barcode, poolName, period)
  ctx.logger.info({ barcode }, `[Executing Command]: ${command}`)

  const result = await ctx.executor.run(command)
  if (!result.ok) {
    ctx.logger.warn({ barcode }, `Retention-lock command reported an error for ${barcode}; checking tape state`)
  }

  ctx.logger.info({ barcode }, `Check Retention Lock Status: Pool Info ${poolName} barcode ${barcode}`)
  const updated = await fetchTape(ctx, poolName, barcode)
  ctx.logger.debug({ barcode, updated }, 'Tape state after lock')

  if (updated?.state === LOCKED_STATE) {
    ctx.logger.info({ barcode }, `retention-lock successfully set for ${barcode} in Pool: ${poolName}`)
    return { barcode, locked: true }
  }

  ctx.logger.error({ barcode, state: updated?.state }, `retention-lock failed to set for ${barcode}`)
  return { barcode, locked: false, reason: updated ? `state is ${updated.state}` : 'tape not found after lock' }
}

/**
 * Lock each tape in turn. Nothing is attempted unless governance is enabled.
 */
export async function lockTapes(
  ctx: LockContext,
  records: TapeRecord[],
  governance: PoolGovernanceState
): Promise<LockOutcome[]> {
  if (records.length === 0) return []

  if (!governance.enabled) {
    ctx.logger.error({ pool: ctx.pool }, `Retention-lock governance mode is not enabled for Pool: ${ctx.pool}; no tapes locked`)
    return []
  }

  const outcomes: LockOutcome[] = []
  for (const record of records) {
    outcomes.push(await lockTape(ctx, record))
  }
  return outcomes
}
