/**
 * Settings, contexts and appliance report text for tests
 */

import type { LockSettings, ReclaimSettings } from '../../src/types.js'
import { DEFAULT_SETTLE_SECONDS, immediatePolicy, type ConsistencyPolicy } from '../../src/lib/consistency.js'
import { createSilentLogger } from '../../src/lib/logger.js'
import type { LockContext, ReclaimContext, TapeRecord, TimestampKind } from '../../src/domain/types.js'
import { MemoryReportSink, RecordingCatalog, ScriptedExecutor } from './fakes.js'

// ============================================================================
// Time
// ============================================================================

const pad = (n: number) => String(n).padStart(2, '0')

/**
 * "YYYY/MM/DD HH:MM:SS" in local time
 */
export function applianceTime(date: Date): string {
  return `${date.getFullYear()}/${pad(date.getMonth() + 1)}/${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
}

// ============================================================================
// Settings
// ============================================================================

const BASE = {
  configPath: '/etc/tapekeeper/params.yaml',
  instances: ['vtl-test-01'],
  pools: ['FEB_3'],
  credentialFile: '/etc/tapekeeper/credentials',
  sshPort: 22,
  commandTimeoutMs: 600000,
  settleSeconds: { ...DEFAULT_SETTLE_SECONDS },
  logsDir: '/tmp/tapekeeper-test/logs',
  reportsDir: '/tmp/tapekeeper-test'
}

export function lockSettings(overrides: Partial<LockSettings> = {}): LockSettings {
  return {
    ...BASE,
    workflow: 'lock',
    minimumTapeUsage: '1 GiB',
    mechanism: 1,
    retention: { tapeDailyDays: 30 },
    ...overrides
  }
}

export function reclaimSettings(overrides: Partial<ReclaimSettings> = {}): ReclaimSettings {
  return {
    ...BASE,
    workflow: 'reclaim',
    jukebox: 'JB1',
    strictLabeling: false,
    ...overrides
  }
}

// ============================================================================
// Contexts
// ============================================================================

export interface ContextOptions<S> {
  settings?: Partial<S>
  pool?: string
  now?: Date
  reports?: MemoryReportSink
  consistency?: ConsistencyPolicy
}

export function lockContext(executor: ScriptedExecutor, options: ContextOptions<LockSettings> = {}): LockContext {
  const now = options.now ?? new Date(2025, 1, 17, 10, 30, 0)
  return {
    instance: executor.host,
    executor,
    logger: createSilentLogger(),
    pool: options.pool ?? 'FEB_3',
    settings: lockSettings(options.settings),
    consistency: options.consistency ?? immediatePolicy,
    reports: options.reports ?? new MemoryReportSink(),
    now: () => now
  }
}

export function reclaimContext(
  executor: ScriptedExecutor,
  catalog: RecordingCatalog,
  options: ContextOptions<ReclaimSettings> = {}
): ReclaimContext {
  const now = options.now ?? new Date(2025, 1, 17, 10, 30, 0)
  return {
    instance: executor.host,
    executor,
    catalog,
    logger: createSilentLogger(),
    pool: options.pool ?? 'FEB_3',
    settings: reclaimSettings(options.settings),
    consistency: options.consistency ?? immediatePolicy,
    reports: options.reports ?? new MemoryReportSink(),
    now: () => now
  }
}

// ============================================================================
// Records
// ============================================================================

export function tape(overrides: Partial<TapeRecord> = {}): TapeRecord {
  return {
    barcode: 'A55157LA',
    poolName: 'FEB_3',
    location: 'Pool_TEST slot 667',
    state: 'RW',
    size: '5 GiB',
    used: '5.0 GiB (100.00%)',
    compression: '1.0x',
    timestampKind: 'modification',
    timestamp: '2025/02/17 08:00:00',
    ...overrides
  }
}

// ============================================================================
// Report text
// ============================================================================

const GAP = '    '

export interface TapeRow {
  barcode: string
  time: string
  pool?: string
  location?: string
  state?: string
  size?: string
  used?: string
  comp?: string
}

export function tapeRow(row: TapeRow): string {
  return [
    row.barcode,
    row.pool ?? 'FEB_3',
    row.location ?? 'Pool_TEST slot 667',
    row.state ?? 'RW',
    row.size ?? '5 GiB',
    row.used ?? '5.0 GiB (100.00%)',
    row.comp ?? '1.0x',
    row.time
  ].join(GAP)
}

/**
 * `vtl tape show` output with its heading, separators and totals
 */
export function tapeListing(rows: TapeRow[], kind: TimestampKind = 'modification'): string {
  const timeHeading = kind === 'retention' ? 'Retention Time' : 'Modification Time'
  return [
    'Processing tapes....',
    '',
    ['Barcode', 'Pool', 'Location', 'State', 'Size', 'Used (%)', 'Comp', timeHeading].join(GAP),
    ['--------', '-----', '------------------', '------', '-----', '-----------------', '----', '-------------------'].join(GAP),
    ...rows.map(tapeRow),
    ['--------', '-----', '------------------', '------', '-----', '-----------------', '----', '-------------------'].join(GAP),
    '',
    `Total number of tapes:${GAP}${rows.length}`,
    `Total size of tapes:${GAP}${rows.length * 5} GiB`,
    `Average Compression:${GAP}1.0x`
  ].join('\n')
}

export interface PlacementRow {
  fileName: string
  size: string
  placementTime: string
  tier?: string
}

/**
 * `filesys report generate file-location` output, tab separated
 */
export function placementReport(rows: PlacementRow[]): string {
  return [
    'File Name\tLocation(Unit(Tier))\tSize\tPlacement Time',
    '---------\t--------------------\t----\t--------------',
    ...rows.map(row => [row.fileName, row.tier ?? 'Active', row.size, row.placementTime].join('\t')),
    ''
  ].join('\n')
}

export function governanceStatus(lock: 'enabled' | 'disabled', mode?: string): string {
  return [
    `Option${GAP}Value`,
    `-------------------${GAP}----------`,
    `Retention-lock${GAP}${lock}`,
    ...(mode ? [`Retention-lock mode${GAP}${mode}`] : []),
    `Retention-lock min-retention-period${GAP}12hr`,
    `Retention-lock max-retention-period${GAP}5year`
  ].join('\n')
}

export const HEALTHY_STATUS = 'VTL admin_state: enabled, process_state: running, licensed'

export function poolListing(names: string[]): string {
  return [
    `Pool Name${GAP}Type${GAP}Tapes`,
    `---------${GAP}----${GAP}-----`,
    ...names.map(name => `${name}${GAP}VTL${GAP}10`),
    '---------'
  ].join('\n')
}
