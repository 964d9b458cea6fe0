/**
 * Tests for governance.ts
 */

import { describe, it, expect } from 'vitest'
import {
  choosePeriod,
  minimumPeriod,
  maximumPeriod,
  tapeLockPeriod,
  queryGovernance,
  enableGovernance,
  setMinimumPeriod,
  prepareGovernance
} from '../../src/domain/governance.js'
import type { PoolGovernanceState } from '../../src/domain/types.js'
import { ScriptedExecutor, failure } from '../helpers/fakes.js'
import { governanceStatus, lockContext } from '../helpers/fixtures.js'

const STATUS = 'mtree retention-lock status mtree /data/col1/FEB_3'
const ENABLE = 'mtree retention-lock enable mode governance mtree /data/col1/FEB_3'
const SET_MIN = 'mtree retention-lock set min-retention-period 12day mtree /data/col1/FEB_3'
const SET_MAX = 'mtree retention-lock set max-retention-period 5year mtree /data/col1/FEB_3'
const ENABLED_REPLY = 'Retention-lock feature is enabled for mtree /data/col1/FEB_3.'

const disabled: PoolGovernanceState = { enabled: false, mode: 'none' }
const retention = { tapeDailyDays: 30, minDailyDays: 12, maxMonthlyYears: 5 }

// ============================================================================
// Periods
// ============================================================================

describe('choosePeriod', () => {
  it('uses the daily value in days', () => {
    expect(choosePeriod(30, undefined, 'year')).toBe('30day')
  })

  it('lets the monthly value override the daily one', () => {
    expect(choosePeriod(30, 2, 'year')).toBe('2year')
    expect(choosePeriod(undefined, 3, 'day')).toBe('3day')
  })

  it('ignores values that are not positive integers', () => {
    expect(choosePeriod(0, undefined, 'year')).toBeUndefined()
    expect(choosePeriod(1.5, -2, 'year')).toBeUndefined()
  })

  it('applies the unit of each bound', () => {
    expect(minimumPeriod({ minDailyDays: 12, minMonthlyDays: 20 })).toBe('20day')
    expect(maximumPeriod({ maxDailyDays: 90 })).toBe('90day')
    expect(maximumPeriod({ maxDailyDays: 90, maxMonthlyYears: 5 })).toBe('5year')
    expect(tapeLockPeriod({ tapeMonthlyYears: 2 })).toBe('2year')
    expect(tapeLockPeriod({})).toBeUndefined()
  })
})

// ============================================================================
// State machine
// ============================================================================

describe('queryGovernance', () => {
  it('reads the pool state', async () => {
    const executor = new ScriptedExecutor().on(STATUS, governanceStatus('enabled', 'governance'))

    const state = await queryGovernance(lockContext(executor))

    expect(state.enabled).toBe(true)
    expect(executor.commands).toEqual([STATUS])
  })

  it('treats a failed query as disabled', async () => {
    const executor = new ScriptedExecutor().on(STATUS, failure('timeout'))

    expect(await queryGovernance(lockContext(executor))).toEqual(disabled)
  })
})

describe('enableGovernance', () => {
  it('enables when the appliance confirms', async () => {
    const executor = new ScriptedExecutor().on(ENABLE, ENABLED_REPLY)

    expect(await enableGovernance(lockContext(executor), disabled)).toEqual({ enabled: true, mode: 'governance' })
  })

  it('does nothing when already enabled', async () => {
    const executor = new ScriptedExecutor()
    const enabled: PoolGovernanceState = { enabled: true, mode: 'governance' }

    expect(await enableGovernance(lockContext(executor), enabled)).toBe(enabled)
    expect(executor.commands).toEqual([])
  })

  it('stays disabled without the confirmation phrase', async () => {
    const executor = new ScriptedExecutor().on(ENABLE, 'Operation in progress')

    expect(await enableGovernance(lockContext(executor), disabled)).toEqual(disabled)
  })
})

describe('setMinimumPeriod', () => {
  it('keeps the previous bound on failure', async () => {
    const executor = new ScriptedExecutor().on(SET_MIN, failure('invalid period'))
    const state: PoolGovernanceState = { enabled: true, mode: 'governance', minPeriod: '12hr' }

    const next = await setMinimumPeriod(lockContext(executor, { settings: { retention } }), state)

    expect(next.minPeriod).toBe('12hr')
    expect(executor.commands).toEqual([SET_MIN])
  })

  it('is skipped while governance is disabled', async () => {
    const executor = new ScriptedExecutor()

    await setMinimumPeriod(lockContext(executor, { settings: { retention } }), disabled)

    expect(executor.commands).toEqual([])
  })
})

describe('prepareGovernance', () => {
  it('enables, then sets minimum and maximum', async () => {
    const executor = new ScriptedExecutor().on(ENABLE, ENABLED_REPLY)

    const state = await prepareGovernance(lockContext(executor, { settings: { retention } }), disabled, 2)

    expect(executor.commands).toEqual([ENABLE, SET_MIN, SET_MAX])
    expect(state).toEqual({ enabled: true, mode: 'governance', minPeriod: '12day', maxPeriod: '5year' })
  })

  it('sets no bounds when enabling fails', async () => {
    const executor = new ScriptedExecutor().on(ENABLE, failure('not licensed'))

    const state = await prepareGovernance(lockContext(executor, { settings: { retention } }), disabled, 2)

    expect(executor.commands).toEqual([ENABLE])
    expect(state).toEqual(disabled)
  })

  it('changes nothing when no tape is eligible', async () => {
    const executor = new ScriptedExecutor()

    expect(await prepareGovernance(lockContext(executor, { settings: { retention } }), disabled, 0)).toBe(disabled)
    expect(executor.commands).toEqual([])
  })
})
