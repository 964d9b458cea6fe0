/**
 * Tapekeeper - Type Definitions
 */

// ============================================================================
// Workflow Types
// ============================================================================

/**
 * The two lifecycle workflows
 * - lock: apply a retention lock to freshly written tapes
 * - reclaim: delete and re-create tapes whose retention lock has expired
 */
export type Workflow = 'lock' | 'reclaim'

/**
 * Modification-date rule for the lock workflow
 * - 1: tape modified today
 * - 2: tape modified yesterday
 *
 * Other values are accepted and match nothing.
 */
export type Mechanism = number

/**
 * Kinds of fixed wait inserted after a mutating remote call
 */
export type SettleKind = 'catalog-delete' | 'catalog-confirm' | 'import' | 'label'

// ============================================================================
// Configuration Types
// ============================================================================

/**
 * Retention bounds, in the units their config keys name
 */
export interface RetentionSettings {
  /** Per-tape lock, daily backups */
  tapeDailyDays?: number
  /** Per-tape lock, monthly backups (overrides daily) */
  tapeMonthlyYears?: number
  /** Pool minimum bound, daily backups */
  minDailyDays?: number
  /** Pool minimum bound, monthly backups (overrides daily) */
  minMonthlyDays?: number
  /** Pool maximum bound, daily backups */
  maxDailyDays?: number
  /** Pool maximum bound, monthly backups (overrides daily) */
  maxMonthlyYears?: number
}

/**
 * Settings common to both workflows
 */
export interface BaseSettings {
  /** Absolute path of the parameters file */
  configPath: string
  instances: string[]
  pools: string[]
  /** Absolute path of the credential file */
  credentialFile: string
  sshPort: number
  commandTimeoutMs: number
  settleSeconds: Record<SettleKind, number>
  logsDir: string
  reportsDir: string
}

export interface LockSettings extends BaseSettings {
  workflow: 'lock'
  /** Size string, e.g. "1 GiB" */
  minimumTapeUsage: string
  mechanism: Mechanism
  retention: RetentionSettings
}

export interface ReclaimSettings extends BaseSettings {
  workflow: 'reclaim'
  jukebox: string
  strictLabeling: boolean
}

export type Settings = LockSettings | ReclaimSettings

// ============================================================================
// Credential Types
// ============================================================================

export interface Credentials {
  username: string
  password: string
}

// ============================================================================
// CLI Types
// ============================================================================

export interface CLIArgs {
  _: string[]
  verbose?: boolean
  'dry-run'?: boolean
  json?: boolean
  workflow?: string
}

/**
 * Resolved options handed to each command
 */
export interface CommandContext {
  args: CLIArgs
  /** Parameters file named on the command line */
  configFile: string
  verbose: boolean
  dryRun: boolean
  jsonOutput: boolean
  /** Settings shape `check` validates against */
  workflow: Workflow
}

export function isWorkflow(value: unknown): value is Workflow {
  return value === 'lock' || value === 'reclaim'
}
