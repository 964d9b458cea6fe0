/**
 * Maps parser results onto the options each command receives
 */

import type { CommandParseResult } from 'cli-args-parser'
import { isWorkflow, type CLIArgs, type CommandContext } from '../../types.js'

export function readFlag(source: Record<string, unknown>, key: string): boolean {
  return source[key] === true
}

function readString(source: Record<string, unknown>, key: string): string | undefined {
  const value = source[key]
  return typeof value === 'string' ? value : undefined
}

/**
 * Flatten the parser result into argv-style args
 */
export function toCliArgs(result: CommandParseResult): CLIArgs {
  const opts: Record<string, unknown> = { ...result.options }

  const args: string[] = [...result.command]
  for (const value of Object.values({ ...result.positional })) {
    if (typeof value === 'string') {
      args.push(value)
    }
  }
  for (const value of result.rest) {
    args.push(String(value))
  }

  return {
    _: args,
    verbose: readFlag(opts, 'verbose'),
    'dry-run': readFlag(opts, 'dry-run'),
    json: readFlag(opts, 'json'),
    workflow: readString(opts, 'workflow')
  }
}

/**
 * Resolve the command context, or explain what is missing
 */
export function buildContext(args: CLIArgs): CommandContext | string {
  const configFile = args._[1]
  if (!configFile) {
    return 'Missing parameters file. Usage: tapekeeper <command> <config.yaml>'
  }

  const workflow = args.workflow ?? 'lock'
  if (!isWorkflow(workflow)) {
    return `Unknown workflow "${workflow}". Use lock or reclaim.`
  }

  return {
    args,
    configFile,
    verbose: args.verbose ?? false,
    dryRun: args['dry-run'] ?? false,
    jsonOutput: args.json ?? false,
    workflow
  }
}
