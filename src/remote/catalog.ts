/**
 * Backup catalog client
 *
 * Volume deletion and labelling run the catalog's own command-line tools
 * as local processes.
 */

import { spawn } from 'node:child_process'
import type { Readable, Writable } from 'node:stream'
import type { Logger } from '../lib/logger.js'
import type { ConsistencyPolicy } from '../lib/consistency.js'
import { errorMessage } from '../lib/errors.js'
import { catalogCommands } from './commands.js'

export interface LabelRequest {
  jukebox: string
  pool: string
  barcode: string
}

export interface CatalogClient {
  /** Remove the volume from the media database */
  deleteVolume(barcode: string): Promise<boolean>
  /** Relabel the volume into its pool */
  labelVolume(request: LabelRequest): Promise<boolean>
}

/**
 * The part of a child process the catalog client talks to
 */
export interface CatalogProcess {
  readonly stdin: Writable | null
  readonly stdout: Readable | null
  readonly stderr: Readable | null
  once(event: 'close', listener: (code: number | null) => void): this
  once(event: 'error', listener: (err: Error) => void): this
}

export type SpawnFn = (command: string, args: string[]) => CatalogProcess

const spawnPiped: SpawnFn = (command, args) => spawn(command, args, { stdio: 'pipe' })

interface ProcessExit {
  code: number | null
  stdout: string
  stderr: string
  error?: Error
}

function collect(stream: Readable | null, into: Buffer[]): void {
  stream?.on('data', (chunk: Buffer) => into.push(chunk))
}

function waitForExit(child: CatalogProcess): Promise<ProcessExit> {
  const stdout: Buffer[] = []
  const stderr: Buffer[] = []
  collect(child.stdout, stdout)
  collect(child.stderr, stderr)

  const text = (chunks: Buffer[]) => Buffer.concat(chunks).toString('utf-8').trim()

  return new Promise(resolve => {
    let settled = false
    const settle = (exit: ProcessExit) => {
      if (settled) return
      settled = true
      resolve(exit)
    }

    child.once('error', error => settle({ code: null, stdout: text(stdout), stderr: text(stderr), error }))
    child.once('close', code => settle({ code, stdout: text(stdout), stderr: text(stderr) }))
  })
}

export interface NetworkerCatalogOptions {
  consistency: ConsistencyPolicy
  logger: Logger
  spawn?: SpawnFn
}

export class NetworkerCatalog implements CatalogClient {
  private readonly spawn: SpawnFn

  constructor(private readonly options: NetworkerCatalogOptions) {
    this.spawn = options.spawn ?? spawnPiped
  }

  /**
   * `nsrmm -d` asks for confirmation; the answer is sent once the
   * confirm window has passed.
   */
  async deleteVolume(barcode: string): Promise<boolean> {
    const { consistency, logger } = this.options
    const [command, ...args] = catalogCommands.deleteVolume(barcode)

    logger.info({ barcode }, `Networker: Executing delete command : ${[command, ...args].join(' ')}`)
    logger.info('Deleting inprogress')

    const child = this.spawn(command, args)
    child.stdin?.on('error', err => {
      logger.warn({ barcode, err: errorMessage(err) }, 'Could not send confirmation to the delete command')
    })
    const exit = waitForExit(child)

    await consistency.awaitConsistency('catalog-confirm')
    child.stdin?.end('y\n')

    const result = await exit
    logger.info({ barcode }, `Command output:\n${result.stdout}`)
    if (result.error) {
      logger.error({ barcode, err: result.error.message }, `Error occurred while deleting volume: ${result.error.message}`)
    } else if (result.stderr) {
      logger.error({ barcode }, `Error occurred while deleting volume:\n${result.stderr}`)
    }

    return result.code === 0
  }

  async labelVolume(request: LabelRequest): Promise<boolean> {
    const { consistency, logger } = this.options
    const [command, ...args] = catalogCommands.labelVolume(request.jukebox, request.pool, request.barcode)

    logger.info({ barcode: request.barcode }, `Executing labeling command : ${[command, ...args].join(' ')}`)

    const result = await waitForExit(this.spawn(command, args))
    if (result.code !== 0) {
      const reason = result.error?.message ?? (result.stderr || `exit status ${String(result.code)}`)
      logger.error({ barcode: request.barcode }, `Error occurred: ${reason}`)
      return false
    }

    await consistency.awaitConsistency('label')
    logger.info({ barcode: request.barcode }, `Command output:\n ${result.stdout}`)
    return true
  }
}
