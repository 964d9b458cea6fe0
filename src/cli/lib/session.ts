/**
 * Wires settings into the collaborators a workflow needs: logger,
 * credentials, appliance executors, waits and the report sink.
 */

import path from 'node:path'
import type { Credentials, Settings } from '../../types.js'
import { createLogger, type Logger } from '../../lib/logger.js'
import { DEFAULT_LOGS_DIR } from '../../lib/config-loader.js'
import { isTapekeeperError } from '../../lib/errors.js'
import { readCredentials } from '../../lib/credentials.js'
import { fixedDelayPolicy, immediatePolicy, type ConsistencyPolicy } from '../../lib/consistency.js'
import { FileReportSink, type ReportSink } from '../../lib/report-writer.js'
import { SshCommandExecutor, type CommandExecutor } from '../../remote/executor.js'

export interface SessionOptions {
  verbose?: boolean
  dryRun?: boolean
  now?: Date
}

export interface Session<S extends Settings> {
  settings: S
  logger: Logger
  consistency: ConsistencyPolicy
  reports: ReportSink
  connect: (instance: string) => CommandExecutor
}

/**
 * Build a session for a run.
 *
 * @throws CredentialError when the credential file cannot be decoded
 */
export function createSession<S extends Settings>(settings: S, options: SessionOptions = {}): Session<S> {
  const { verbose = false, dryRun = false, now = new Date() } = options

  const logger = createLogger({
    logsDir: settings.logsDir,
    console: verbose,
    level: verbose ? 'debug' : 'info',
    now
  })
  const credentials = loadCredentials(logger, settings.credentialFile)

  logger.info(
    { workflow: settings.workflow, configPath: settings.configPath, instances: settings.instances, pools: settings.pools, dryRun },
    `Starting ${settings.workflow} run`
  )

  return {
    settings,
    logger,
    consistency: dryRun ? immediatePolicy : fixedDelayPolicy(settings.settleSeconds),
    reports: new FileReportSink(settings.reportsDir, now),
    connect: instance => new SshCommandExecutor({
      host: instance,
      port: settings.sshPort,
      credentials,
      timeoutMs: settings.commandTimeoutMs,
      logger: logger.child({ instance })
    })
  }
}

function logFailure(logger: Logger, error: unknown): void {
  if (isTapekeeperError(error)) {
    logger.error({ code: error.code, context: error.context }, error.message)
  } else {
    logger.error({ err: error }, 'Run failed before it started')
  }
}

function loadCredentials(logger: Logger, filePath: string): Credentials {
  try {
    return readCredentials(filePath)
  } catch (err) {
    logFailure(logger, err)
    throw err
  }
}

/**
 * Log a failure that happened before the settings, and with them the
 * configured logs directory, were available.
 */
export function recordStartupFailure(error: unknown, options: { logsDir?: string; now?: Date } = {}): void {
  const logger = createLogger({ logsDir: path.resolve(options.logsDir ?? DEFAULT_LOGS_DIR), now: options.now })
  logFailure(logger, error)
}
