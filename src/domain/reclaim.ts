/**
 * Reclaim Pipeline
 *
 * Drives each expired tape through catalog delete, export, remove,
 * create, import and label. The first stage that fails stops that tape
 * only; the rest of the batch carries on.
 */

import { applianceCommands } from '../remote/commands.js'
import { errorMessage } from '../lib/errors.js'
import { capacityValue } from '../lib/size.js'
import { isVault, libraryName, slotNumber } from './eligibility.js'
import {
  PIPELINE_STAGES,
  type PipelineOutcome,
  type PipelineStage,
  type ReclaimBatchResult,
  type ReclaimContext,
  type TapeRecord
} from './types.js'

// ============================================================================
// Stages
// ============================================================================

type StageRunner = (ctx: ReclaimContext, record: TapeRecord) => Promise<boolean>

async function runStep(ctx: ReclaimContext, command: string, failure: string, success: string): Promise<boolean> {
  ctx.logger.info({ pool: ctx.pool }, `[Executing Command]: ${command}`)
  const result = await ctx.executor.run(command)
  if (!result.ok) {
    ctx.logger.error({ pool: ctx.pool }, failure)
    return false
  }
  ctx.logger.info({ pool: ctx.pool }, success)
  return true
}

const deleteFromCatalog: StageRunner = async (ctx, { barcode }) => {
  const deleted = await ctx.catalog.deleteVolume(barcode)
  await ctx.consistency.awaitConsistency('catalog-delete')
  if (deleted) {
    ctx.logger.info({ barcode }, `barcode ${barcode} has been deleted from the networker`)
  }
  return deleted
}

/**
 * A tape without a slot number has nothing to eject. A vault tape with a
 * slot number cannot be exported.
 */
const exportFromLibrary: StageRunner = async (ctx, { barcode, location, poolName }) => {
  const slot = slotNumber(location)
  if (slot === null) {
    ctx.logger.info({ barcode, location }, `Barcode: ${barcode} is not in a library slot; nothing to export`)
    return true
  }
  if (isVault(location)) {
    ctx.logger.error({ barcode, location }, `Barcode: ${barcode} is in the vault and cannot be exported`)
    return false
  }

  const library = libraryName(location)
  ctx.logger.info({ barcode }, `Exporting Barcode: ${barcode} from Library: ${library} and Pool: ${poolName}.`)
  return runStep(
    ctx,
    applianceCommands.exportTape(library, slot),
    `Error while exporting Barcode: ${barcode} from Pool: ${poolName}`,
    `Barcode: ${barcode} from Pool: ${poolName} successfully exported`
  )
}

const removeFromPool: StageRunner = async (ctx, { barcode }) => {
  ctx.logger.info({ barcode }, `Removing Tape with Barcode: ${barcode} from Pool: ${ctx.pool} on OpenSystem: ${ctx.instance}.`)
  return runStep(
    ctx,
    applianceCommands.deleteTape(barcode, ctx.pool),
    `Error while removing Barcode: ${barcode} on Pool: ${ctx.pool}`,
    `Barcode: ${barcode} on Pool: ${ctx.pool} removed successfully`
  )
}

/**
 * Same barcode and pool; the capacity keeps the size's number and drops its unit
 */
const recreateTape: StageRunner = async (ctx, { barcode, size }) => {
  const capacity = capacityValue(size)
  if (capacity === null) {
    ctx.logger.error({ barcode, size }, `Cannot read a capacity from size "${size}" for Barcode: ${barcode}`)
    return false
  }

  ctx.logger.info({ barcode }, `Creating Tape with Barcode: ${barcode} on Pool: ${ctx.pool} on OpenSystem: ${ctx.instance}.`)
  return runStep(
    ctx,
    applianceCommands.addTape(barcode, capacity, ctx.pool),
    `Error while creating Barcode: ${barcode} on Pool: ${ctx.pool}`,
    `Barcode: ${barcode} on Pool: ${ctx.pool} created successfully`
  )
}

/**
 * Vault tapes are never re-imported
 */
const importIntoLibrary: StageRunner = async (ctx, { barcode, location }) => {
  if (isVault(location)) {
    ctx.logger.error({ barcode, location }, `Barcode: ${barcode} came from the vault and is not imported`)
    return false
  }

  ctx.logger.info({ barcode }, `Importing Barcode: ${barcode} into Pool: ${ctx.pool}.`)
  return runStep(
    ctx,
    applianceCommands.importTape(libraryName(location), barcode, ctx.pool),
    `Error while importing Barcode: ${barcode} to Pool: ${ctx.pool}`,
    `Barcode: ${barcode} on Pool: ${ctx.pool} successfully imported`
  )
}

/**
 * A failed label is logged and, unless strict labeling is on, the tape
 * still counts as reclaimed.
 */
const labelInCatalog: StageRunner = async (ctx, { barcode }) => {
  await ctx.consistency.awaitConsistency('import')

  ctx.logger.info({ barcode }, `Labeling barcode ${barcode} on networker`)
  const labeled = await ctx.catalog.labelVolume({
    jukebox: ctx.settings.jukebox,
    pool: ctx.pool,
    barcode
  })

  if (labeled) {
    ctx.logger.info({ barcode }, `Labeling barcode ${barcode} on networker is completed`)
    return true
  }

  ctx.logger.error({ barcode }, `Labeling barcode ${barcode} on networker failed`)
  return !ctx.settings.strictLabeling
}

const STAGE_RUNNERS: Record<PipelineStage, StageRunner> = {
  'catalog-delete': deleteFromCatalog,
  export: exportFromLibrary,
  remove: removeFromPool,
  create: recreateTape,
  import: importIntoLibrary,
  label: labelInCatalog
}

const STAGE_DESCRIPTIONS: Record<PipelineStage, string> = {
  'catalog-delete': 'delete on networker',
  export: 'export from library',
  remove: 'remove from pool',
  create: 'create on pool',
  import: 'import into pool',
  label: 'label on networker'
}

// ============================================================================
// Pipeline
// ============================================================================

/**
 * Run one tape through every stage, stopping at the first failure
 */
export async function reclaimTape(ctx: ReclaimContext, record: TapeRecord): Promise<PipelineOutcome> {
  for (const stage of PIPELINE_STAGES) {
    let passed: boolean
    try {
      passed = await STAGE_RUNNERS[stage](ctx, record)
    } catch (err) {
      ctx.logger.error({ barcode: record.barcode, stage, err: errorMessage(err) }, `Stage ${stage} failed for Barcode: ${record.barcode}`)
      passed = false
    }

    if (!passed) {
      return { status: 'failed', barcode: record.barcode, stage }
    }
  }
  return { status: 'succeeded', barcode: record.barcode }
}

function emptyBuckets(): Record<PipelineStage, TapeRecord[]> {
  return {
    'catalog-delete': [],
    export: [],
    remove: [],
    create: [],
    import: [],
    label: []
  }
}

const RULE = '='.repeat(107)

/**
 * Reclaim every tape in order, then log the failure buckets
 */
export async function reclaimTapes(ctx: ReclaimContext, records: TapeRecord[]): Promise<ReclaimBatchResult> {
  const outcomes: PipelineOutcome[] = []
  const succeeded: string[] = []
  const failed = emptyBuckets()

  if (records.length === 0) {
    ctx.logger.info({ pool: ctx.pool }, 'No RL tapes found')
    return { outcomes, succeeded, failed }
  }

  for (const record of records) {
    ctx.logger.info(RULE)
    const outcome = await reclaimTape(ctx, record)
    outcomes.push(outcome)

    if (outcome.status === 'succeeded') {
      succeeded.push(outcome.barcode)
    } else {
      failed[outcome.stage].push(record)
    }
    ctx.logger.info(RULE)
  }

  logBatch(ctx, { outcomes, succeeded, failed })
  return { outcomes, succeeded, failed }
}

function logBatch(ctx: ReclaimContext, result: ReclaimBatchResult): void {
  for (const stage of PIPELINE_STAGES) {
    const tapes = result.failed[stage]
    if (tapes.length === 0) continue

    const description = STAGE_DESCRIPTIONS[stage]
    ctx.logger.error({ pool: ctx.pool, stage }, `[START][FAILED] List of tapes failed while ${description}`)
    ctx.logger.error({ pool: ctx.pool, stage, tapes }, JSON.stringify(tapes, null, 4))
    ctx.logger.error({ pool: ctx.pool, stage }, `[END][FAILED] List of tapes failed while ${description}`)
  }

  if (result.succeeded.length > 0) {
    ctx.logger.info({ pool: ctx.pool, barcodes: result.succeeded }, `Reclaimed tapes: ${result.succeeded.join(', ')}`)
  }
}
