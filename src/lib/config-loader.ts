/**
 * Tapekeeper Config Loader
 *
 * Loads the YAML parameters file named on the command line and turns it
 * into validated settings for one workflow.
 */

import fs from 'node:fs'
import path from 'node:path'
import { parse as parseYaml } from 'yaml'
import type {
  Settings,
  LockSettings,
  ReclaimSettings,
  BaseSettings,
  SettleKind,
  Workflow
} from '../types.js'
import {
  ConfigNotFoundError,
  InvalidConfigError,
  MissingConfigKeyError,
  errorMessage
} from './errors.js'
import { DEFAULT_SETTLE_SECONDS } from './consistency.js'

const DEFAULT_SSH_PORT = 22
const DEFAULT_COMMAND_TIMEOUT_SECONDS = 600
export const DEFAULT_LOGS_DIR = 'logs'

const SETTLE_KINDS: SettleKind[] = ['catalog-delete', 'catalog-confirm', 'import', 'label']

/**
 * Expand environment variables in a string
 * Supports: ${VAR}, ${VAR:-default}, $VAR
 */
export function expandEnvVars(str: string): string {
  // Handle ${VAR:-default} syntax
  str = str.replace(/\$\{([^}:]+):-([^}]*)\}/g, (_, varName: string, defaultValue: string) => {
    return process.env[varName] || defaultValue
  })

  // Handle ${VAR} syntax
  str = str.replace(/\$\{([^}]+)\}/g, (_, varName: string) => {
    return process.env[varName] || ''
  })

  // Handle $VAR syntax (word boundary)
  str = str.replace(/\$([A-Z_][A-Z0-9_]*)/gi, (_, varName: string) => {
    return process.env[varName] || ''
  })

  return str
}

/**
 * Recursively expand env vars in a parsed YAML value
 */
function expandEnvVarsInValue(value: unknown): unknown {
  if (typeof value === 'string') {
    return expandEnvVars(value)
  }

  if (Array.isArray(value)) {
    return value.map(item => expandEnvVarsInValue(item))
  }

  if (value !== null && typeof value === 'object') {
    const result: Record<string, unknown> = {}
    for (const [key, item] of Object.entries(value)) {
      result[key] = expandEnvVarsInValue(item)
    }
    return result
  }

  return value
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value)
}

/**
 * Resolve the parameters file path, failing when it does not exist
 */
export function resolveParametersFile(file: string, cwd: string = process.cwd()): string {
  const filePath = path.resolve(cwd, file)
  if (!fs.existsSync(filePath)) {
    throw new ConfigNotFoundError(file)
  }
  return filePath
}

/**
 * Load the raw parameters document.
 *
 * Keys keep the names operators already use in their parameter files
 * (open_system_instance(s), pool_name(s), open_system_credential_file_path,
 * jukebox_name, minimum_tape_usage, execution_logic_mechanism and the
 * retention_lock_period / minimum_ / maximum_retention_lock_period family).
 */
export function loadParameters(configPath: string): Record<string, unknown> {
  let parsed: unknown
  try {
    parsed = parseYaml(fs.readFileSync(configPath, 'utf-8'))
  } catch (err) {
    throw new InvalidConfigError(errorMessage(err), configPath, err instanceof Error ? err : undefined)
  }

  if (parsed === null || parsed === undefined) {
    throw new InvalidConfigError('Failed to load parameters.', configPath)
  }

  const expanded = expandEnvVarsInValue(parsed)
  if (!isRecord(expanded)) {
    throw new InvalidConfigError('expected a mapping of parameter names to values', configPath)
  }

  return expanded
}

// ============================================================================
// Value readers
// ============================================================================

/**
 * Split a list parameter. Accepts a YAML list or "a, b, c".
 */
export function splitList(value: unknown): string[] {
  const items = Array.isArray(value) ? value : String(value).split(',')
  return items
    .map(item => String(item).trim())
    .filter(item => item.length > 0)
}

function readOptionalNumber(raw: Record<string, unknown>, key: string, configPath: string): number | undefined {
  const value = raw[key]
  if (value === undefined || value === null) return undefined
  if (typeof value === 'number') return value
  if (typeof value === 'string' && value.trim() !== '' && !Number.isNaN(Number(value))) {
    return Number(value)
  }
  throw new InvalidConfigError(`"${key}" must be a number`, configPath)
}

function readRequired(raw: Record<string, unknown>, keys: string[], configPath: string): unknown {
  for (const key of keys) {
    const value = raw[key]
    if (value !== undefined && value !== null) {
      return value
    }
  }
  throw new MissingConfigKeyError(keys[0], configPath)
}

function readRequiredList(raw: Record<string, unknown>, keys: string[], configPath: string): string[] {
  const list = splitList(readRequired(raw, keys, configPath))
  if (list.length === 0) {
    throw new MissingConfigKeyError(keys[0], configPath)
  }
  return list
}

function readSettleSeconds(raw: Record<string, unknown>, configPath: string): Record<SettleKind, number> {
  const settle = { ...DEFAULT_SETTLE_SECONDS }
  const overrides = raw.settle_seconds

  if (overrides === undefined || overrides === null) return settle
  if (!isRecord(overrides)) {
    throw new InvalidConfigError('"settle_seconds" must be a mapping', configPath)
  }

  for (const kind of SETTLE_KINDS) {
    const value = readOptionalNumber(overrides, kind, configPath)
    if (value !== undefined) {
      if (value < 0) {
        throw new InvalidConfigError(`"settle_seconds.${kind}" must not be negative`, configPath)
      }
      settle[kind] = value
    }
  }

  return settle
}

// ============================================================================
// Settings
// ============================================================================

function buildBaseSettings(
  raw: Record<string, unknown>,
  configPath: string,
  keys: { instances: string[]; pools: string[] }
): BaseSettings {
  const configDir = path.dirname(configPath)

  const instances = readRequiredList(raw, keys.instances, configPath)
  const pools = readRequiredList(raw, keys.pools, configPath)
  const credentialFile = String(readRequired(raw, ['open_system_credential_file_path'], configPath))

  const logsDir = typeof raw.logs_dir === 'string' ? raw.logs_dir : DEFAULT_LOGS_DIR
  const reportsDir = typeof raw.reports_dir === 'string' ? raw.reports_dir : '.'

  return {
    configPath,
    instances,
    pools,
    credentialFile: path.resolve(configDir, credentialFile),
    sshPort: readOptionalNumber(raw, 'ssh_port', configPath) ?? DEFAULT_SSH_PORT,
    commandTimeoutMs:
      (readOptionalNumber(raw, 'command_timeout_seconds', configPath) ?? DEFAULT_COMMAND_TIMEOUT_SECONDS) * 1000,
    settleSeconds: readSettleSeconds(raw, configPath),
    logsDir: path.resolve(configDir, logsDir),
    reportsDir: path.resolve(configDir, reportsDir)
  }
}

/**
 * Validate parameters for the lock workflow
 */
export function buildLockSettings(params: Record<string, unknown>, configPath: string): LockSettings {
  const base = buildBaseSettings(params, configPath, {
    instances: ['open_system_instance', 'open_system_instances'],
    pools: ['pool_name', 'pool_names']
  })

  const minimumTapeUsage = String(readRequired(params, ['minimum_tape_usage'], configPath)).trim()
  readRequired(params, ['execution_logic_mechanism'], configPath)
  const mechanism = readOptionalNumber(params, 'execution_logic_mechanism', configPath) ?? 0

  return {
    ...base,
    workflow: 'lock',
    minimumTapeUsage,
    mechanism,
    retention: {
      tapeDailyDays: readOptionalNumber(params, 'retention_lock_period_for_tapes_for_daily_in_days', configPath),
      tapeMonthlyYears: readOptionalNumber(params, 'retention_lock_period_for_tapes_for_monthly_in_years', configPath),
      minDailyDays: readOptionalNumber(params, 'minimum_retention_lock_period_for_mtree_daily_backup_in_days', configPath),
      minMonthlyDays: readOptionalNumber(params, 'minimum_retention_lock_period_for_mtree_monthly_backup_in_days', configPath),
      maxDailyDays: readOptionalNumber(params, 'maximum_retention_lock_period_for_mtree_daily_backup_in_days', configPath),
      maxMonthlyYears: readOptionalNumber(params, 'maximum_retention_lock_period_for_mtree_monthly_backup_in_years', configPath)
    }
  }
}

/**
 * Validate parameters for the reclaim workflow
 */
export function buildReclaimSettings(params: Record<string, unknown>, configPath: string): ReclaimSettings {
  const base = buildBaseSettings(params, configPath, {
    instances: ['open_system_instances', 'open_system_instance'],
    pools: ['pool_names', 'pool_name']
  })

  const jukebox = String(readRequired(params, ['jukebox_name'], configPath)).trim()

  return {
    ...base,
    workflow: 'reclaim',
    jukebox,
    strictLabeling: params.strict_labeling === true
  }
}

/**
 * Load and validate the parameters file for a workflow
 */
export function loadSettings(file: string, workflow: 'lock', cwd?: string): LockSettings
export function loadSettings(file: string, workflow: 'reclaim', cwd?: string): ReclaimSettings
export function loadSettings(file: string, workflow: Workflow, cwd?: string): Settings
export function loadSettings(file: string, workflow: Workflow, cwd?: string): Settings {
  const configPath = resolveParametersFile(file, cwd)
  const raw = loadParameters(configPath)

  return workflow === 'lock'
    ? buildLockSettings(raw, configPath)
    : buildReclaimSettings(raw, configPath)
}
