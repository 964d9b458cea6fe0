/**
 * Size strings
 *
 * The appliance prints sizes as "<value> <unit>" with binary multipliers.
 */

import { UnsupportedSizeUnitError } from './errors.js'

const KIB = 1024
const MIB = KIB * 1024
const GIB = MIB * 1024
const TIB = GIB * 1024

const UNIT_BYTES: Record<string, number> = {
  B: 1,
  KB: KIB,
  MB: MIB,
  MIB: MIB,
  GB: GIB,
  GIB: GIB,
  TB: TIB,
  TIB: TIB
}

/**
 * Convert a size string such as "10 GiB" or "500 MB" into bytes.
 *
 * @throws UnsupportedSizeUnitError for a unit outside the table or a
 *   string that is not "<value> <unit>"
 */
export function sizeToBytes(size: string): number {
  const parts = size.trim().split(/\s+/)
  if (parts.length !== 2) {
    throw new UnsupportedSizeUnitError(parts.slice(1).join(' '), size)
  }

  const [rawValue, rawUnit] = parts
  const value = Number(rawValue)
  const multiplier = UNIT_BYTES[rawUnit.toUpperCase()]

  if (multiplier === undefined || Number.isNaN(value)) {
    throw new UnsupportedSizeUnitError(rawUnit, size)
  }

  return value * multiplier
}

/**
 * Integer capacity of a size string with its unit dropped ("5 GiB" → 5).
 * Returns null when the value is not numeric.
 */
export function capacityValue(size: string): number | null {
  const [rawValue] = size.trim().split(/\s+/)
  const value = Number.parseFloat(rawValue)
  return Number.isNaN(value) ? null : Math.trunc(value)
}
