/**
 * Eligibility rules
 *
 * Predicates over a single tape record. The selectors at the bottom are
 * the classification boundary: a record that makes a predicate throw is
 * logged and left out.
 */

import type { Mechanism } from '../types.js'
import type { Logger } from '../lib/logger.js'
import { errorMessage } from '../lib/errors.js'
import { sizeToBytes } from '../lib/size.js'
import { addDays, isSameCalendarDay, parseApplianceTimestamp, parsePlacementTime } from '../lib/time.js'
import { LOCK_MARKER, NO_RETENTION, type PlacementRecord, type TapeRecord } from './types.js'

const SLOT_SUFFIX = /slot\s+(\d+)$/
const TRAILING_NUMBER = /(\d+)$/

/**
 * First word of a location: the library name, or "vault"
 */
export function libraryName(location: string): string {
  return location.trim().split(/\s+/)[0] ?? ''
}

export function isVault(location: string): boolean {
  return libraryName(location) === 'vault'
}

/**
 * Slot number at the end of a location, if any
 */
export function slotNumber(location: string): string | null {
  return TRAILING_NUMBER.exec(location.trim())?.[1] ?? null
}

/**
 * Leading number of the used column, the used size in its own unit.
 *
 * "5.0 GiB (100.00%)" → 5, "0.1 GiB (0.00%)" → 0.1. Null when it is not numeric.
 */
export function usedAmount(record: TapeRecord): number | null {
  const leading = Number.parseFloat(record.used.trim().split(/\s+/)[0] ?? '')
  return Number.isNaN(leading) ? null : leading
}

// ============================================================================
// Predicates
// ============================================================================

/**
 * The tape sits in a library slot, not in the vault
 */
export function isLoaded(record: TapeRecord): boolean {
  const location = record.location.trim()
  return location.length > 0 && !isVault(location) && SLOT_SUFFIX.test(location)
}

export function isCurrentlyLocked(record: TapeRecord): boolean {
  return record.state.includes(LOCK_MARKER)
}

export function notAlreadyLocked(record: TapeRecord): boolean {
  return !isCurrentlyLocked(record)
}

/**
 * Placement record backing a tape, matched by barcode substring
 */
export function findPlacement(record: TapeRecord, placements: PlacementRecord[]): PlacementRecord | undefined {
  return placements.find(placement => placement.fileName.includes(record.barcode))
}

/**
 * Written data on the tape: a non-zero used size, or a placement record
 * larger than the minimum usage with readable modification and
 * placement times.
 *
 * @throws UnsupportedSizeUnitError when a size cannot be converted
 * @throws InvalidTimestampError when either time cannot be read
 */
export function isUsageEligible(
  record: TapeRecord,
  placements: PlacementRecord[],
  minimumUsage: string
): boolean {
  const used = usedAmount(record)
  if (used !== null && used > 0) {
    return true
  }

  const placement = findPlacement(record, placements)
  if (!placement) {
    return false
  }

  if (sizeToBytes(placement.size) <= sizeToBytes(minimumUsage)) {
    return false
  }

  parseApplianceTimestamp(record.timestamp)
  parsePlacementTime(placement.placementTime)
  return true
}

/**
 * Modified on the calendar day the mechanism selects:
 * 1 = today, 2 = yesterday. Other mechanisms never match.
 */
export function isModifiedOn(record: TapeRecord, mechanism: Mechanism, now: Date): boolean {
  const modified = parseApplianceTimestamp(record.timestamp)

  switch (mechanism) {
    case 1:
      return isSameCalendarDay(modified, now)
    case 2:
      return isSameCalendarDay(modified, addDays(now, -1))
    default:
      return false
  }
}

/**
 * Retention expiry strictly before `now`. A tape without a lock never expires.
 */
export function isRetentionExpired(record: TapeRecord, now: Date): boolean {
  if (record.timestamp.trim() === NO_RETENTION) {
    return false
  }
  return now.getTime() > parseApplianceTimestamp(record.timestamp).getTime()
}

// ============================================================================
// Selection
// ============================================================================

export interface LockCriteria {
  placements: PlacementRecord[]
  minimumUsage: string
  mechanism: Mechanism
  now: Date
}

export function isLockEligible(record: TapeRecord, criteria: LockCriteria): boolean {
  return (
    isLoaded(record) &&
    isUsageEligible(record, criteria.placements, criteria.minimumUsage) &&
    notAlreadyLocked(record) &&
    isModifiedOn(record, criteria.mechanism, criteria.now)
  )
}

export function isReclaimEligible(record: TapeRecord, now: Date): boolean {
  return isCurrentlyLocked(record) && isRetentionExpired(record, now)
}

function selectWhere(
  records: TapeRecord[],
  predicate: (record: TapeRecord) => boolean,
  logger: Logger
): TapeRecord[] {
  return records.filter(record => {
    try {
      return predicate(record)
    } catch (err) {
      logger.warn({ barcode: record.barcode, err: errorMessage(err) }, `Skipping Barcode: ${record.barcode}: ${errorMessage(err)}`)
      return false
    }
  })
}

/**
 * Tapes to lock, in listing order
 */
export function selectTapesForLock(records: TapeRecord[], criteria: LockCriteria, logger: Logger): TapeRecord[] {
  return selectWhere(records, record => isLockEligible(record, criteria), logger)
}

/**
 * Locked tapes whose retention has run out, in listing order
 */
export function selectTapesForReclaim(records: TapeRecord[], now: Date, logger: Logger): TapeRecord[] {
  return selectWhere(records, record => isReclaimEligible(record, now), logger)
}
