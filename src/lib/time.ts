/**
 * Appliance time handling
 *
 * The appliance prints wall-clock times in its own local zone without an
 * offset, so every value here is interpreted in the process's local zone.
 */

import { InvalidTimestampError } from './errors.js'

const APPLIANCE_LAYOUT = 'YYYY/MM/DD HH:MM:SS'
const PLACEMENT_LAYOUT = 'Www Mmm DD HH:MM:SS YYYY'

const APPLIANCE_PATTERN = /^(\d{4})\/(\d{1,2})\/(\d{1,2}) (\d{1,2}):(\d{2}):(\d{2})$/
const PLACEMENT_PATTERN = /^[A-Za-z]{3} ([A-Za-z]{3}) +(\d{1,2}) (\d{1,2}):(\d{2}):(\d{2}) (\d{4})$/

const MONTHS = ['Jan', 'Feb', 'Mar', 'Apr', 'May', 'Jun', 'Jul', 'Aug', 'Sep', 'Oct', 'Nov', 'Dec']

function buildLocalDate(
  value: string,
  layout: string,
  parts: [number, number, number, number, number, number]
): Date {
  const [year, month, day, hour, minute, second] = parts
  const date = new Date(year, month - 1, day, hour, minute, second)

  // Reject rollovers such as 2025/02/31
  if (
    date.getFullYear() !== year ||
    date.getMonth() !== month - 1 ||
    date.getDate() !== day ||
    hour > 23 || minute > 59 || second > 59
  ) {
    throw new InvalidTimestampError(value, layout)
  }

  return date
}

/**
 * Parse a listing timestamp such as "2025/02/16 19:45:48"
 */
export function parseApplianceTimestamp(value: string): Date {
  const match = APPLIANCE_PATTERN.exec(value.trim())
  if (!match) {
    throw new InvalidTimestampError(value, APPLIANCE_LAYOUT)
  }

  const [, year, month, day, hour, minute, second] = match.map(Number)
  return buildLocalDate(value, APPLIANCE_LAYOUT, [year, month, day, hour, minute, second])
}

/**
 * Parse a placement-report time such as "Sun Feb 16 19:45:48 2025"
 */
export function parsePlacementTime(value: string): Date {
  const match = PLACEMENT_PATTERN.exec(value.trim())
  const monthIndex = match ? MONTHS.indexOf(match[1]) : -1
  if (!match || monthIndex === -1) {
    throw new InvalidTimestampError(value, PLACEMENT_LAYOUT)
  }

  const [day, hour, minute, second, year] = match.slice(2).map(Number)
  return buildLocalDate(value, PLACEMENT_LAYOUT, [year, monthIndex + 1, day, hour, minute, second])
}

/**
 * Midnight at the start of the date's calendar day
 */
export function startOfDay(date: Date): Date {
  return new Date(date.getFullYear(), date.getMonth(), date.getDate())
}

/**
 * Same wall-clock time, shifted by whole calendar days
 */
export function addDays(date: Date, days: number): Date {
  const shifted = new Date(date.getTime())
  shifted.setDate(shifted.getDate() + days)
  return shifted
}

export function isSameCalendarDay(a: Date, b: Date): boolean {
  return startOfDay(a).getTime() === startOfDay(b).getTime()
}

const pad = (n: number) => String(n).padStart(2, '0')

/**
 * "DD_MM_YYYY", used for the daily log file name
 */
export function formatDayStamp(date: Date): string {
  return `${pad(date.getDate())}_${pad(date.getMonth() + 1)}_${date.getFullYear()}`
}

/**
 * "DD_MM_YYYY_HH_MM_SS", used for report file names
 */
export function formatRunStamp(date: Date): string {
  return `${formatDayStamp(date)}_${pad(date.getHours())}_${pad(date.getMinutes())}_${pad(date.getSeconds())}`
}
