/**
 * Result Reporter
 *
 * Re-reads the pool after a run and hands the final state of the tapes
 * that were acted on to the report sink.
 */

import type { Workflow } from '../types.js'
import { errorMessage } from '../lib/errors.js'
import { fetchTapeListing } from './appliance.js'
import type { RunContext, TapeRecord } from './types.js'

export interface ResultReport {
  records: TapeRecord[]
  /** Where the report was written, when writing succeeded */
  path?: string
}

export async function reportResults(
  ctx: RunContext,
  workflow: Workflow,
  barcodes: string[]
): Promise<ResultReport> {
  const wanted = new Set(barcodes)
  const listing = await fetchTapeListing(ctx, ctx.pool, 'modification')
  const records = listing.filter(record => wanted.has(record.barcode))

  const content = JSON.stringify(records, null, 4)
  ctx.logger.info({ pool: ctx.pool, workflow, count: records.length }, `Final state of tapes in Pool: ${ctx.pool}`)

  try {
    const path = ctx.reports.write(workflow, ctx.pool, content)
    ctx.logger.info({ pool: ctx.pool, path }, `Report written to ${path}`)
    return { records, path }
  } catch (err) {
    ctx.logger.error({ pool: ctx.pool, err: errorMessage(err) }, `Failed to write report for Pool: ${ctx.pool}`)
    return { records }
  }
}
