/**
 * Appliance probes
 *
 * Read-only queries against an appliance: health, pools, listings and the
 * file placement report.
 */

import { applianceCommands } from '../remote/commands.js'
import { parsePlacementReport, parsePoolNames, parseTapeListing } from './parser.js'
import type { PlacementRecord, ProbeContext, TapeRecord, TimestampKind } from './types.js'

const HEALTH_MARKERS = ['enabled', 'running', 'licensed']

/**
 * Run a read-only command. Empty output counts as a failed retrieval.
 */
async function query(ctx: ProbeContext, command: string): Promise<string | null> {
  ctx.logger.info({ instance: ctx.instance }, `[Executing Command]: ${command}`)
  const result = await ctx.executor.run(command)
  if (!result.ok || result.output.trim() === '') {
    return null
  }
  return result.output
}

/**
 * The VTL service is enabled, running and licensed
 */
export async function checkApplianceHealth(ctx: ProbeContext): Promise<boolean> {
  const output = await query(ctx, applianceCommands.status())
  const healthy = output !== null && HEALTH_MARKERS.every(marker => output.includes(marker))

  if (healthy) {
    ctx.logger.info({ instance: ctx.instance }, 'VTL is enabled, running, and licensed.')
  } else {
    ctx.logger.error({ instance: ctx.instance }, `VTL on ${ctx.instance} is not enabled, running, and licensed.`)
  }
  return healthy
}

/**
 * Configured pools that exist on the appliance, in appliance order
 */
export async function discoverPools(ctx: ProbeContext, configured: string[]): Promise<string[]> {
  const output = await query(ctx, applianceCommands.poolList())
  if (output === null) {
    ctx.logger.error({ instance: ctx.instance }, `Failed to retrieve pools from ${ctx.instance}.`)
    return []
  }

  const wanted = new Set(configured)
  const found: string[] = []
  for (const name of parsePoolNames(output)) {
    if (wanted.has(name) && !found.includes(name)) {
      found.push(name)
    }
  }

  for (const name of configured) {
    if (!found.includes(name)) {
      ctx.logger.warn({ instance: ctx.instance, pool: name }, `Pool: ${name} not found on ${ctx.instance}.`)
    }
  }
  return found
}

/**
 * Tape listing for a pool.
 * - modification: newest writes first
 * - retention: retention expiry column, sorted by state
 */
export async function fetchTapeListing(
  ctx: ProbeContext,
  pool: string,
  kind: TimestampKind
): Promise<TapeRecord[]> {
  const command = kind === 'retention'
    ? applianceCommands.tapesByRetention(pool)
    : applianceCommands.tapesByModification(pool)

  const output = await query(ctx, command)
  if (output === null) {
    ctx.logger.error({ instance: ctx.instance, pool }, `Failed to retrieve Pool: ${pool} details.`)
    return []
  }
  return parseTapeListing(output, kind, ctx.logger)
}

/**
 * Current record of a single tape
 */
export async function fetchTape(ctx: ProbeContext, pool: string, barcode: string): Promise<TapeRecord | undefined> {
  const output = await query(ctx, applianceCommands.tape(pool, barcode))
  if (output === null) {
    ctx.logger.error({ instance: ctx.instance, pool, barcode }, `Failed to retrieve Barcode: ${barcode} details.`)
    return undefined
  }
  return parseTapeListing(output, 'modification', ctx.logger)[0]
}

/**
 * File placement report for the pool's directory
 */
export async function fetchPlacementReport(ctx: ProbeContext, pool: string): Promise<PlacementRecord[]> {
  ctx.logger.info({ instance: ctx.instance, pool }, `Generate filesys report for Pool: /data/col1/${pool}`)

  const output = await query(ctx, applianceCommands.placementReport(pool))
  if (output === null) {
    ctx.logger.error({ instance: ctx.instance, pool }, `Failed to generate filesys report for Pool: ${pool}.`)
    return []
  }

  const records = parsePlacementReport(output, ctx.logger)
  ctx.logger.debug({ pool, records }, 'Generated placement report')
  return records
}
