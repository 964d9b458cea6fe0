/**
 * Tapekeeper `lock` Command
 *
 * Usage:
 *   tapekeeper lock params.yaml              Lock today's (or yesterday's) tapes
 *   tapekeeper lock params.yaml --dry-run    List eligible tapes only
 *   tapekeeper lock params.yaml --json       Print the run summary as JSON
 */

import type { CommandContext } from '../../types.js'
import { loadSettings } from '../../lib/config-loader.js'
import { runLockWorkflow, type LockPoolSummary, type WorkflowSummary } from '../../domain/workflows.js'
import { createSession } from '../lib/session.js'
import { c, print } from '../lib/colors.js'
import * as ui from '../ui.js'

export async function runLock(context: CommandContext): Promise<void> {
  const { configFile, verbose, dryRun, jsonOutput } = context

  const settings = loadSettings(configFile, 'lock')
  const session = createSession(settings, { verbose, dryRun })

  const summary = await runLockWorkflow({ ...session, dryRun })
  session.logger.info({ pools: summary.pools.length, errors: summary.errors.length }, 'Retention lock run finished')

  if (jsonOutput) {
    ui.output(JSON.stringify(summary, null, 2))
    return
  }

  renderLockSummary(summary)
}

function renderLockSummary(summary: WorkflowSummary<LockPoolSummary>): void {
  ui.header(summary.dryRun ? 'Retention lock (dry run)' : 'Retention lock')

  for (const instance of summary.skippedInstances) {
    print.warning(`Skipped ${c.instance(instance)}: VTL is not enabled, running, and licensed`)
  }

  const rows = summary.pools.map(pool => {
    const locked = pool.outcomes.filter(outcome => outcome.locked).length
    return {
      instance: pool.instance,
      pool: pool.pool,
      governance: pool.governance.enabled ? 'enabled' : pool.governance.mode,
      eligible: String(pool.selected.length),
      locked: String(locked),
      failed: String(pool.outcomes.length - locked),
      report: pool.report?.path ?? ''
    }
  })

  if (rows.length > 0) {
    ui.output(ui.formatTable(
      [
        { key: 'instance', header: 'Instance' },
        { key: 'pool', header: 'Pool' },
        { key: 'governance', header: 'Governance' },
        { key: 'eligible', header: 'Eligible', align: 'right' },
        { key: 'locked', header: 'Locked', align: 'right' },
        { key: 'failed', header: 'Failed', align: 'right' },
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
