/**
 * Tests for config-loader.ts
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import fs from 'node:fs'
import path from 'node:path'
import os from 'node:os'
import {
  loadSettings,
  splitList,
  expandEnvVars
} from '../../src/lib/config-loader.js'
import {
  ConfigNotFoundError,
  InvalidConfigError,
  MissingConfigKeyError
} from '../../src/lib/errors.js'

const LOCK_PARAMS = `
open_system_instance: vtl-test-01, vtl-test-02
pool_name:
  - FEB_3
  - MAR_1
open_system_credential_file_path: secrets/creds
minimum_tape_usage: 1 GiB
execution_logic_mechanism: 2
retention_lock_period_for_tapes_for_daily_in_days: 30
minimum_retention_lock_period_for_mtree_daily_backup_in_days: 12
maximum_retention_lock_period_for_mtree_monthly_backup_in_years: 5
`

const RECLAIM_PARAMS = `
open_system_instances: [vtl-test-01]
pool_names: FEB_3
open_system_credential_file_path: /etc/tk/creds
jukebox_name: JB1
`

describe('config-loader', () => {
  let tempDir: string

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'tapekeeper-config-test-'))
  })

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true })
    delete process.env.TK_POOL
  })

  function writeParams(content: string, name = 'params.yaml'): string {
    fs.writeFileSync(path.join(tempDir, name), content)
    return name
  }

  // ==========================================================================
  // lock
  // ==========================================================================

  describe('lock settings', () => {
    it('reads every lock parameter', () => {
      const settings = loadSettings(writeParams(LOCK_PARAMS), 'lock', tempDir)

      expect(settings.workflow).toBe('lock')
      expect(settings.configPath).toBe(path.join(tempDir, 'params.yaml'))
      expect(settings.instances).toEqual(['vtl-test-01', 'vtl-test-02'])
      expect(settings.pools).toEqual(['FEB_3', 'MAR_1'])
      expect(settings.minimumTapeUsage).toBe('1 GiB')
      expect(settings.mechanism).toBe(2)
      expect(settings.retention).toEqual({
        tapeDailyDays: 30,
        tapeMonthlyYears: undefined,
        minDailyDays: 12,
        minMonthlyDays: undefined,
        maxDailyDays: undefined,
        maxMonthlyYears: 5
      })
    })

    it('resolves paths relative to the parameters file', () => {
      const settings = loadSettings(writeParams(LOCK_PARAMS), 'lock', tempDir)

      expect(settings.credentialFile).toBe(path.join(tempDir, 'secrets', 'creds'))
      expect(settings.logsDir).toBe(path.join(tempDir, 'logs'))
      expect(settings.reportsDir).toBe(tempDir)
    })

    it('applies remote defaults', () => {
      const settings = loadSettings(writeParams(LOCK_PARAMS), 'lock', tempDir)

      expect(settings.sshPort).toBe(22)
      expect(settings.commandTimeoutMs).toBe(600000)
      expect(settings.settleSeconds).toEqual({
        'catalog-delete': 60,
        'catalog-confirm': 50,
        import: 60,
        label: 60
      })
    })

    it('requires minimum_tape_usage', () => {
      const file = writeParams(LOCK_PARAMS.replace('minimum_tape_usage: 1 GiB\n', ''))

      expect(() => loadSettings(file, 'lock', tempDir)).toThrow(MissingConfigKeyError)
      expect(() => loadSettings(file, 'lock', tempDir)).toThrow(
        `'minimum_tape_usage' parameter is missing on ${path.join(tempDir, 'params.yaml')} file`
      )
    })

    it('rejects a non-numeric retention period', () => {
      const file = writeParams(`${LOCK_PARAMS}retention_lock_period_for_tapes_for_monthly_in_years: soon\n`)

      expect(() => loadSettings(file, 'lock', tempDir)).toThrow(InvalidConfigError)
    })
  })

  // ==========================================================================
  // reclaim
  // ==========================================================================

  describe('reclaim settings', () => {
    it('reads every reclaim parameter', () => {
      const settings = loadSettings(writeParams(RECLAIM_PARAMS), 'reclaim', tempDir)

      expect(settings.workflow).toBe('reclaim')
      expect(settings.instances).toEqual(['vtl-test-01'])
      expect(settings.pools).toEqual(['FEB_3'])
      expect(settings.credentialFile).toBe('/etc/tk/creds')
      expect(settings.jukebox).toBe('JB1')
      expect(settings.strictLabeling).toBe(false)
    })

    it('enables strict labeling only for a literal true', () => {
      const strict = loadSettings(writeParams(`${RECLAIM_PARAMS}strict_labeling: true\n`), 'reclaim', tempDir)
      expect(strict.strictLabeling).toBe(true)

      const quoted = loadSettings(writeParams(`${RECLAIM_PARAMS}strict_labeling: "yes"\n`), 'reclaim', tempDir)
      expect(quoted.strictLabeling).toBe(false)
    })

    it('requires jukebox_name', () => {
      const file = writeParams(RECLAIM_PARAMS.replace('jukebox_name: JB1\n', ''))

      expect(() => loadSettings(file, 'reclaim', tempDir)).toThrow("'jukebox_name' parameter is missing")
    })

    it('names the preferred key when instances are missing', () => {
      const file = writeParams(RECLAIM_PARAMS.replace('open_system_instances: [vtl-test-01]\n', ''))

      expect(() => loadSettings(file, 'reclaim', tempDir)).toThrow("'open_system_instances' parameter is missing")
    })
  })

  // ==========================================================================
  // file handling
  // ==========================================================================

  describe('file handling', () => {
    it('fails for a missing file', () => {
      expect(() => loadSettings('nope.yaml', 'lock', tempDir)).toThrow(ConfigNotFoundError)
      expect(() => loadSettings('nope.yaml', 'lock', tempDir)).toThrow("The file 'nope.yaml' does not exist.")
    })

    it('fails for invalid YAML', () => {
      const file = writeParams('pool_name: [FEB_3\n')

      expect(() => loadSettings(file, 'lock', tempDir)).toThrow(InvalidConfigError)
    })

    it('fails for an empty document', () => {
      const file = writeParams('')

      expect(() => loadSettings(file, 'lock', tempDir)).toThrow('Failed to load parameters.')
    })

    it('expands environment variables', () => {
      process.env.TK_POOL = 'APR_9'
      const file = writeParams(RECLAIM_PARAMS.replace('pool_names: FEB_3', 'pool_names: "${TK_POOL}"'))

      expect(loadSettings(file, 'reclaim', tempDir).pools).toEqual(['APR_9'])
    })

    it('overrides individual settle durations', () => {
      const file = writeParams(`${RECLAIM_PARAMS}settle_seconds:\n  import: 5\n`)

      expect(loadSettings(file, 'reclaim', tempDir).settleSeconds.import).toBe(5)
      expect(loadSettings(file, 'reclaim', tempDir).settleSeconds.label).toBe(60)
    })

    it('rejects a negative settle duration', () => {
      const file = writeParams(`${RECLAIM_PARAMS}settle_seconds:\n  label: -1\n`)

      expect(() => loadSettings(file, 'reclaim', tempDir)).toThrow(
        `Invalid config in ${path.join(tempDir, 'params.yaml')}: "settle_seconds.label" must not be negative`
      )
    })
  })
})

describe('splitList', () => {
  it('splits comma-separated strings', () => {
    expect(splitList(' FEB_3 , MAR_1,,')).toEqual(['FEB_3', 'MAR_1'])
  })

  it('accepts YAML lists', () => {
    expect(splitList(['FEB_3', ' MAR_1 '])).toEqual(['FEB_3', 'MAR_1'])
  })
})

describe('expandEnvVars', () => {
  it('falls back to the default', () => {
    delete process.env.TK_UNSET_FOR_TEST
    expect(expandEnvVars('${TK_UNSET_FOR_TEST:-logs}')).toBe('logs')
  })
})
