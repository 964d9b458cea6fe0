/**
 * Remote command channel
 *
 * The appliance is driven by verbatim CLI commands over SSH. Callers only
 * see a success/failure result; transport errors are logged here.
 */

import ssh2, { type Client } from 'ssh2'
import type { Credentials } from '../types.js'
import type { Logger } from '../lib/logger.js'
import { RemoteCommandError, errorMessage } from '../lib/errors.js'
import { withTimeout } from '../lib/timeout.js'

export type CommandResult =
  | { ok: true; output: string }
  | { ok: false; error: string }

export interface CommandExecutor {
  readonly host: string
  run(command: string): Promise<CommandResult>
}

export interface SshExecutorOptions {
  host: string
  port: number
  credentials: Credentials
  timeoutMs: number
  logger: Logger
}

interface ExecOutput {
  stdout: string
  stderr: string
}

/**
 * Opens one connection per command. Anything written to stderr marks the
 * command as failed.
 */
export class SshCommandExecutor implements CommandExecutor {
  readonly host: string

  constructor(private readonly options: SshExecutorOptions) {
    this.host = options.host
  }

  async run(command: string): Promise<CommandResult> {
    const { host, timeoutMs, logger } = this.options
    const client = new ssh2.Client()

    try {
      const { stdout, stderr } = await withTimeout(this.exec(client, command), timeoutMs, command)

      if (stderr) {
        logger.error({ host, command, stderr }, `Error executing '${command}': ${stderr}`)
        return { ok: false, error: stderr }
      }

      logger.debug({ host, command }, 'Remote command completed')
      return { ok: true, output: stdout }
    } catch (err) {
      const error = new RemoteCommandError(host, command, errorMessage(err), err instanceof Error ? err : undefined)
      logger.error({ host, command, err: error }, `SSH Connection error: ${error.message}`)
      return { ok: false, error: error.message }
    } finally {
      client.end()
    }
  }

  private exec(client: Client, command: string): Promise<ExecOutput> {
    const { host, port, credentials } = this.options

    return new Promise((resolve, reject) => {
      client
        .on('ready', () => {
          client.exec(command, (err, channel) => {
            if (err) {
              reject(err)
              return
            }

            const stdout: Buffer[] = []
            const stderr: Buffer[] = []

            channel.on('data', (chunk: Buffer) => stdout.push(chunk))
            channel.stderr.on('data', (chunk: Buffer) => stderr.push(chunk))
            channel.on('close', () => {
              resolve({
                stdout: Buffer.concat(stdout).toString('utf-8').trim(),
                stderr: Buffer.concat(stderr).toString('utf-8').trim()
              })
            })
          })
        })
        .on('error', reject)
        .connect({
          host,
          port,
          username: credentials.username,
          password: credentials.password
        })
    })
  }
}
