#!/usr/bin/env node
/**
 * Tapekeeper CLI
 *
 * Retention-lock and reclaim automation for virtual tape libraries
 */

import fs from 'node:fs'
import path from 'node:path'
import { fileURLToPath } from 'node:url'
import { createCLI, type CLISchema } from 'cli-args-parser'
import { ConfigError, formatErrorForCli, isTapekeeperError } from '../lib/errors.js'
import { c, print, tapekeeperFormatter } from './lib/colors.js'
import { buildContext, readFlag, toCliArgs } from './lib/args.js'
import { recordStartupFailure } from './lib/session.js'
import * as ui from './ui.js'
import { runLock } from './commands/lock.js'
import { runReclaim } from './commands/reclaim.js'
import { runCheck } from './commands/check.js'

const VERSION = process.env.TAPEKEEPER_VERSION || getPackageVersion() || '0.0.0'

function getPackageVersion(): string | undefined {
  // Walk up from this file to the nearest package.json
  let dir = path.dirname(fileURLToPath(import.meta.url))
  for (let i = 0; i < 5; i++) {
    const pkgPath = path.join(dir, 'package.json')
    if (fs.existsSync(pkgPath)) {
      const pkg: unknown = JSON.parse(fs.readFileSync(pkgPath, 'utf-8'))
      if (pkg !== null && typeof pkg === 'object' && 'version' in pkg && typeof pkg.version === 'string') {
        return pkg.version
      }
      return undefined
    }
    dir = path.dirname(dir)
  }
  return undefined
}

const configPositional = [
  { name: 'config', required: true, description: 'YAML parameters file' }
]

const cliSchema: CLISchema = {
  name: 'tapekeeper',
  version: VERSION,
  description: 'Retention-lock and reclaim automation for virtual tape libraries',
  autoShort: false,
  strict: true,
  formatter: tapekeeperFormatter,
  help: {
    includeGlobalOptionsInCommands: true
  },

  options: {
    help: {
      short: 'h',
      type: 'boolean',
      default: false,
      description: 'Show help'
    },
    version: {
      type: 'boolean',
      default: false,
      description: 'Show version'
    },
    verbose: {
      short: 'v',
      type: 'boolean',
      default: false,
      description: 'Mirror the run log to stderr, including debug events'
    },
    'dry-run': {
      type: 'boolean',
      default: false,
      description: 'Classify tapes without changing anything'
    },
    json: {
      type: 'boolean',
      default: false,
      description: 'Output the run summary as JSON'
    }
  },

  commands: {
    lock: {
      description: 'Apply a retention lock to newly written tapes',
      positional: configPositional
    },
    reclaim: {
      description: 'Delete and re-create tapes whose retention lock has expired',
      aliases: ['reset'],
      positional: configPositional
    },
    check: {
      description: 'Validate parameters and credentials, then probe each appliance',
      positional: configPositional,
      options: {
        workflow: {
          type: 'string',
          default: 'lock',
          description: 'Parameter set to validate: lock or reclaim'
        }
      }
    }
  }
}

const cli = createCLI(cliSchema)

async function main(): Promise<void> {
  const result = cli.parse(process.argv.slice(2))
  const args = toCliArgs(result)
  const opts: Record<string, unknown> = { ...result.options }

  if (readFlag(opts, 'help') || result.command.length === 0) {
    ui.output(cli.help(result.command))
    return
  }

  if (readFlag(opts, 'version')) {
    ui.output(`tapekeeper v${VERSION}`)
    return
  }

  if (result.errors.length > 0) {
    for (const error of result.errors) {
      print.error(String(error))
    }
    process.exit(1)
  }

  const context = buildContext(args)
  if (typeof context === 'string') {
    print.error(context)
    process.exit(1)
  }

  const command = result.command[0]

  try {
    switch (command) {
      case 'lock':
        await runLock(context)
        break

      case 'reclaim':
      case 'reset':
        await runReclaim(context)
        break

      case 'check':
        await runCheck(context)
        break

      default:
        print.error(`Unknown command: ${c.command(command)}`)
        ui.log(`Run "${c.command('tapekeeper --help')}" for usage information`)
        process.exit(1)
    }
  } catch (err) {
    if (err instanceof ConfigError) {
      recordStartupFailure(err)
    }
    if (isTapekeeperError(err)) {
      print.error(err.message)
      if (err.suggestion) {
        ui.log(`  ${c.muted('Suggestion:')} ${err.suggestion}`)
      }
      if (context.verbose && err.context) {
        ui.log(`  ${c.muted('Context:')} ${JSON.stringify(err.context)}`)
      }
    } else {
      print.error(err instanceof Error ? err.message : String(err))
    }
    process.exit(1)
  }
}

main().catch((err: unknown) => {
  print.error(isTapekeeperError(err) ? formatErrorForCli(err) : `Fatal error: ${String(err)}`)
  process.exit(1)
})
