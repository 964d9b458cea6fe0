/**
 * Command vocabulary
 *
 * Appliance commands are sent verbatim over the remote channel; catalog
 * commands are argument vectors for local processes.
 */

/** Directory backing a pool on the appliance */
export function mtreePath(pool: string): string {
  return `/data/col1/${pool}`
}

export const applianceCommands = {
  status: () => 'vtl status',

  poolList: () => 'vtl pool show all',

  /** Listing with modification times, newest first */
  tapesByModification: (pool: string) =>
    `vtl tape show pool ${pool} sort-by modtime descending`,

  /** Listing with retention-lock expiry times */
  tapesByRetention: (pool: string) =>
    `vtl tape show pool ${pool} time-display retention sort-by state ascending`,

  tape: (pool: string, barcode: string) =>
    `vtl tape show pool ${pool} barcode ${barcode}`,

  placementReport: (pool: string) =>
    `filesys report generate file-location path ${mtreePath(pool)}`,

  governanceStatus: (pool: string) =>
    `mtree retention-lock status mtree ${mtreePath(pool)}`,

  governanceEnable: (pool: string) =>
    `mtree retention-lock enable mode governance mtree ${mtreePath(pool)}`,

  governanceSetMin: (pool: string, period: string) =>
    `mtree retention-lock set min-retention-period ${period} mtree ${mtreePath(pool)}`,

  governanceSetMax: (pool: string, period: string) =>
    `mtree retention-lock set max-retention-period ${period} mtree ${mtreePath(pool)}`,

  lockTape: (barcode: string, pool: string, period: string) =>
    `vtl tape modify ${barcode} pool ${pool} retention-lock ${period}`,

  deleteTape: (barcode: string, pool: string) =>
    `vtl tape del ${barcode} pool ${pool}`,

  addTape: (barcode: string, capacity: number, pool: string) =>
    `vtl tape add ${barcode} capacity ${capacity} pool ${pool}`,

  exportTape: (library: string, slot: string) =>
    `vtl export ${library} slot ${slot}`,

  importTape: (library: string, barcode: string, pool: string) =>
    `vtl import ${library} barcode ${barcode} count 1 pool ${pool} element slot`
} as const

/** Response phrase confirming governance mode was enabled */
export const GOVERNANCE_ENABLED_PHRASE = 'Retention-lock feature is enabled'

export const catalogCommands = {
  deleteVolume: (barcode: string): string[] => ['nsrmm', '-d', barcode],

  labelVolume: (jukebox: string, pool: string, barcode: string): string[] =>
    ['nsrjb', '-L', '-j', jukebox, `-b${pool}`, '-T', barcode, '-Y']
} as const
