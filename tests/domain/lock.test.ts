/**
 * Tests for lock.ts
 */

import { describe, it, expect } from 'vitest'
import { lockTape, lockTapes } from '../../src/domain/lock.js'
import type { PoolGovernanceState } from '../../src/domain/types.js'
import { ScriptedExecutor, failure } from '../helpers/fakes.js'
import { lockContext, tape, tapeListing } from '../helpers/fixtures.js'

const MODIFY = 'vtl tape modify A55157LA pool FEB_3 retention-lock 30day'
const SHOW = 'vtl tape show pool FEB_3 barcode A55157LA'

const enabled: PoolGovernanceState = { enabled: true, mode: 'governance' }

function showing(state: string): string {
  return tapeListing([{ barcode: 'A55157LA', state, time: '2025/02/17 08:00:00' }])
}

describe('lockTape', () => {
  it('locks the tape and confirms its state', async () => {
    const executor = new ScriptedExecutor().on(SHOW, showing('RO/RL*'))

    const outcome = await lockTape(lockContext(executor), tape())

    expect(outcome).toEqual({ barcode: 'A55157LA', locked: true })
    expect(executor.commands).toEqual([MODIFY, SHOW])
  })

  it('uses the monthly period when configured', async () => {
    const executor = new ScriptedExecutor()

    await lockTape(lockContext(executor, { settings: { retention: { tapeDailyDays: 30, tapeMonthlyYears: 7 } } }), tape())

    expect(executor.commands[0]).toBe('vtl tape modify A55157LA pool FEB_3 retention-lock 7year')
  })

  it('needs the exact locked state', async () => {
    const executor = new ScriptedExecutor().on(SHOW, showing('RO/RL'))

    expect(await lockTape(lockContext(executor), tape())).toEqual({
      barcode: 'A55157LA',
      locked: false,
      reason: 'state is RO/RL'
    })
  })

  it('trusts the re-read state over the modify result', async () => {
    const executor = new ScriptedExecutor()
      .on(MODIFY, failure('**** retention-lock already set'))
      .on(SHOW, showing('RO/RL*'))

    expect((await lockTape(lockContext(executor), tape())).locked).toBe(true)
  })

  it('fails when the tape cannot be re-read', async () => {
    const executor = new ScriptedExecutor()

    expect(await lockTape(lockContext(executor), tape())).toEqual({
      barcode: 'A55157LA',
      locked: false,
      reason: 'tape not found after lock'
    })
  })

  it('sends nothing without a configured period', async () => {
    const executor = new ScriptedExecutor()

    const outcome = await lockTape(lockContext(executor, { settings: { retention: {} } }), tape())

    expect(outcome.locked).toBe(false)
    expect(outcome.reason).toBe('no retention-lock period configured')
    expect(executor.commands).toEqual([])
  })
})

describe('lockTapes', () => {
  it('locks each tape in order', async () => {
    const executor = new ScriptedExecutor()
      .on(SHOW, showing('RO/RL*'))
      .on('vtl tape show pool FEB_3 barcode A55158LA', tapeListing([{ barcode: 'A55158LA', state: 'RW', time: '2025/02/17 08:00:00' }]))

    const outcomes = await lockTapes(lockContext(executor), [tape(), tape({ barcode: 'A55158LA' })], enabled)

    expect(outcomes).toEqual([
      { barcode: 'A55157LA', locked: true },
      { barcode: 'A55158LA', locked: false, reason: 'state is RW' }
    ])
    expect(executor.commands).toEqual([
      MODIFY,
      SHOW,
      'vtl tape modify A55158LA pool FEB_3 retention-lock 30day',
      'vtl tape show pool FEB_3 barcode A55158LA'
    ])
  })

  it('locks nothing while governance is disabled', async () => {
    const executor = new ScriptedExecutor()

    expect(await lockTapes(lockContext(executor), [tape()], { enabled: false, mode: 'other' })).toEqual([])
    expect(executor.commands).toEqual([])
  })
})
