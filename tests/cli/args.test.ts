/**
 * Tests for CLI argument mapping
 */

import { describe, it, expect } from 'vitest'
import { buildContext, readFlag } from '../../src/cli/lib/args.js'
import type { CLIArgs } from '../../src/types.js'

describe('readFlag', () => {
  it('only accepts a literal true', () => {
    expect(readFlag({ json: true }, 'json')).toBe(true)
    expect(readFlag({ json: 'true' }, 'json')).toBe(false)
    expect(readFlag({}, 'json')).toBe(false)
  })
})

describe('buildContext', () => {
  it('maps flags onto the context', () => {
    const args: CLIArgs = { _: ['lock', 'params.yaml'], 'dry-run': true, json: true }

    expect(buildContext(args)).toEqual({
      args,
      configFile: 'params.yaml',
      verbose: false,
      dryRun: true,
      jsonOutput: true,
      workflow: 'lock'
    })
  })

  it('takes the workflow to check', () => {
    const context = buildContext({ _: ['check', 'params.yaml'], workflow: 'reclaim' })

    expect(typeof context === 'string' ? context : context.workflow).toBe('reclaim')
  })

  it('explains a missing parameters file', () => {
    expect(buildContext({ _: ['reclaim'] })).toBe('Missing parameters file. Usage: tapekeeper <command> <config.yaml>')
  })

  it('rejects an unknown workflow', () => {
    expect(buildContext({ _: ['check', 'params.yaml'], workflow: 'purge' })).toBe(
      'Unknown workflow "purge". Use lock or reclaim.'
    )
  })
})
