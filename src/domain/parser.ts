/**
 * Appliance report parsing
 *
 * Appliance output is column-aligned text. Cells are separated by tabs or
 * by runs of two or more spaces; single spaces occur inside cells
 * ("Pool_TEST slot 667", "5 GiB").
 */

import type { Logger } from '../lib/logger.js'
import { errorMessage } from '../lib/errors.js'
import type {
  GovernanceMode,
  PlacementRecord,
  PoolGovernanceState,
  TapeRecord,
  TimestampKind
} from './types.js'

export const TAPE_COLUMNS = 8
export const PLACEMENT_COLUMNS = 4

const TAPE_HEADINGS = new Set([
  'Processing tapes....',
  'Barcode',
  'Pool',
  'Location',
  'State',
  'Size',
  'Used (%)',
  'Comp',
  'Modification Time',
  'Retention Time',
  'Total size of tapes:',
  'Total number of tapes:',
  'Average Compression:'
])

const PLACEMENT_HEADINGS = new Set([
  'File Name',
  'Location(Unit(Tier))',
  'Size',
  'Placement Time'
])

const POOL_HEADINGS = new Set(['Pool Name', 'Total pools:'])

const SEPARATOR = /^-+$/

/**
 * Split a line into trimmed, non-empty cells
 */
export function splitCells(line: string): string[] {
  return line
    .split(/\t|\s{2,}/)
    .map(cell => cell.trim())
    .filter(cell => cell.length > 0)
}

/**
 * Split a tab-separated line. Placement times pad single-digit days with
 * a second space, so spaces never separate cells here.
 */
export function splitTabCells(line: string): string[] {
  return line
    .split('\t')
    .map(cell => cell.trim())
    .filter(cell => cell.length > 0)
}

function isNoise(cells: string[], headings: Set<string>): boolean {
  return cells.some(cell => headings.has(cell) || SEPARATOR.test(cell))
}

/**
 * Data rows of a report: blank, heading and separator lines and rows of
 * the wrong width are dropped.
 */
function dataRows(
  text: string,
  columns: number,
  headings: Set<string>,
  split: (line: string) => string[] = splitCells
): string[][] {
  const rows: string[][] = []
  for (const line of text.split(/\r?\n/)) {
    const cells = split(line)
    if (cells.length === 0 || isNoise(cells, headings)) continue
    if (cells.length !== columns) continue
    rows.push(cells)
  }
  return rows
}

/**
 * Parse an 8-column tape listing (`vtl tape show pool ...`).
 *
 * A failure part-way through is logged and the records parsed so far are
 * returned.
 */
export function parseTapeListing(text: string, kind: TimestampKind, logger: Logger): TapeRecord[] {
  const records: TapeRecord[] = []
  try {
    for (const [barcode, poolName, location, state, size, used, compression, timestamp] of dataRows(
      text,
      TAPE_COLUMNS,
      TAPE_HEADINGS
    )) {
      records.push({ barcode, poolName, location, state, size, used, compression, timestampKind: kind, timestamp })
    }
  } catch (err) {
    logger.error({ err: errorMessage(err) }, 'Failed to parse tape listing')
  }
  return records
}

/**
 * Parse a tab-separated file-location report
 * (`filesys report generate file-location`)
 */
export function parsePlacementReport(text: string, logger: Logger): PlacementRecord[] {
  const records: PlacementRecord[] = []
  try {
    const rows = dataRows(text, PLACEMENT_COLUMNS, PLACEMENT_HEADINGS, splitTabCells)
    for (const [fileName, tier, size, placementTime] of rows) {
      records.push({ fileName, tier, size, placementTime })
    }
  } catch (err) {
    logger.error({ err: errorMessage(err) }, 'Failed to parse placement report')
  }
  return records
}

/**
 * Parse an option/value table (`mtree retention-lock status`).
 * Option names are matched case-insensitively.
 */
export function parseOptionTable(text: string): Map<string, string> {
  const options = new Map<string, string>()
  for (const line of text.split(/\r?\n/)) {
    const cells = splitCells(line)
    if (cells.length < 2 || cells.some(cell => SEPARATOR.test(cell))) continue
    options.set(cells[0].toLowerCase(), cells[1])
  }
  return options
}

function toMode(value: string | undefined): GovernanceMode {
  if (!value) return 'none'
  return value.toLowerCase() === 'governance' ? 'governance' : 'other'
}

/**
 * Governance state of a pool. Enabled only when the lock is on and the
 * mode is governance.
 */
export function parseGovernanceStatus(text: string): PoolGovernanceState {
  const options = parseOptionTable(text)
  const lock = options.get('retention-lock')?.toLowerCase()
  const mode = toMode(options.get('retention-lock mode'))

  return {
    enabled: lock === 'enabled' && mode === 'governance',
    mode,
    minPeriod: options.get('retention-lock min-retention-period'),
    maxPeriod: options.get('retention-lock max-retention-period')
  }
}

/**
 * Names in the first column of `vtl pool show all`
 */
export function parsePoolNames(text: string): string[] {
  const names: string[] = []
  for (const line of text.split(/\r?\n/)) {
    const [first] = splitCells(line)
    if (first && !SEPARATOR.test(first) && !POOL_HEADINGS.has(first)) {
      names.push(first)
    }
  }
  return names
}
