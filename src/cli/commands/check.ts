/**
 * Tapekeeper `check` Command
 *
 * Validates a parameters file and its credential file, then probes each
 * appliance with `vtl status`. Nothing is changed.
 *
 * Usage:
 *   tapekeeper check params.yaml                      Check as lock parameters
 *   tapekeeper check params.yaml --workflow reclaim   Check as reclaim parameters
 */

import type { CommandContext } from '../../types.js'
import { loadSettings } from '../../lib/config-loader.js'
import { checkApplianceHealth } from '../../domain/appliance.js'
import { createSession } from '../lib/session.js'
import { c, labeled, print } from '../lib/colors.js'
import * as ui from '../ui.js'

export async function runCheck(context: CommandContext): Promise<void> {
  const { configFile, verbose, jsonOutput, workflow } = context

  const settings = loadSettings(configFile, workflow)
  const session = createSession(settings, { verbose, dryRun: true })

  const instances: Array<{ instance: string; healthy: boolean }> = []
  for (const instance of settings.instances) {
    const healthy = await checkApplianceHealth({
      instance,
      executor: session.connect(instance),
      logger: session.logger.child({ instance })
    })
    instances.push({ instance, healthy })
  }

  if (jsonOutput) {
    ui.output(JSON.stringify({ workflow, configPath: settings.configPath, pools: settings.pools, instances }, null, 2))
    return
  }

  ui.header(`Parameters: ${settings.configPath}`)
  ui.log(labeled('Workflow', c.command(workflow)))
  ui.log(labeled('Pools', settings.pools.map(pool => c.pool(pool)).join(', ')))

  for (const { instance, healthy } of instances) {
    if (healthy) {
      print.success(`${instance}: VTL is enabled, running, and licensed`)
    } else {
      print.error(`${instance}: VTL is not available`)
    }
  }
}
