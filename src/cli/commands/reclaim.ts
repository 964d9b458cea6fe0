/**
 * Tapekeeper `reclaim` Command
 *
 * Usage:
 *   tapekeeper reclaim params.yaml             Reclaim tapes whose lock has expired
 *   tapekeeper reclaim params.yaml --dry-run   List expired tapes only
 */

import type { CommandContext } from '../../types.js'
import { loadSettings } from '../../lib/config-loader.js'
import { NetworkerCatalog } from '../../remote/catalog.js'
import { runReclaimWorkflow, type ReclaimPoolSummary, type WorkflowSummary } from '../../domain/workflows.js'
import { PIPELINE_STAGES } from '../../domain/types.js'
import { createSession } from '../lib/session.js'
import { c, print } from '../lib/colors.js'
import * as ui from '../ui.js'

export async function runReclaim(context: CommandContext): Promise<void> {
  const { configFile, verbose, dryRun, jsonOutput } = context

  const settings = loadSettings(configFile, 'reclaim')
  const session = createSession(settings, { verbose, dryRun })
  const catalog = new NetworkerCatalog({ consistency: session.consistency, logger: session.logger })

  const summary = await runReclaimWorkflow({ ...session, catalog, dryRun })
  session.logger.info({ pools: summary.pools.length, errors: summary.errors.length }, 'Reclaim run finished')

  if (jsonOutput) {
    ui.output(JSON.stringify(summary, null, 2))
    return
  }

  renderReclaimSummary(summary)
}

/**
 * "export:1, import:2"
 */
function failureCounts(pool: ReclaimPoolSummary): string {
  if (!pool.result) return ''
  const { failed } = pool.result
  return PIPELINE_STAGES
    .filter(stage => failed[stage].length > 0)
    .map(stage => `${stage}:${failed[stage].length}`)
    .join(', ')
}

function renderReclaimSummary(summary: WorkflowSummary<ReclaimPoolSummary>): void {
  ui.header(summary.dryRun ? 'Reclaim (dry run)' : 'Reclaim')

  for (const instance of summary.skippedInstances) {
    print.warning(`Skipped ${c.instance(instance)}: VTL is not enabled, running, and licensed`)
  }

  const rows = summary.pools.map(pool => ({
    instance: pool.instance,
    pool: pool.pool,
    expired: String(pool.selected.length),
    reclaimed: String(pool.result?.succeeded.length ?? 0),
    failed: failureCounts(pool),
    report: pool.report?.path ?? ''
  }))

  if (rows.length > 0) {
    ui.output(ui.formatTable(
      [
        { key: 'instance', header: 'Instance' },
        { key: 'pool', header: 'Pool' },
        { key: 'expired', header: 'Expired', align: 'right' },
        { key: 'reclaimed', header: 'Reclaimed', align: 'right' },
        { key: 'failed', header: 'Failed at' },
        { key: 'report', header: 'Report' }
      ],
      rows
    ))
  }

  if (summary.dryRun) {
    for (const pool of summary.pools) {
      for (const barcode of pool.selected) {
        print.item(`${c.pool(pool.pool)} ${c.barcode(barcode)}`)
      }
    }
  }

  for (const error of summary.errors) {
    print.error(`${error.instance}${error.pool ? `/${error.pool}` : ''}: ${error.error}`)
  }
}
