/**
 * Report sinks
 *
 * One append-only text artifact per pool per run, in a folder per workflow.
 */

import { appendFileSync, mkdirSync } from 'node:fs'
import { join } from 'node:path'
import type { Workflow } from '../types.js'
import { formatRunStamp } from './time.js'

export const REPORT_FOLDERS: Record<Workflow, string> = {
  lock: 'reports_retention_lock',
  reclaim: 'reports_expired_RL'
}

export interface ReportSink {
  /**
   * Persist a report and return where it went
   */
  write(workflow: Workflow, pool: string, content: string): string
}

export function reportFilePath(reportsDir: string, workflow: Workflow, pool: string, runStartedAt: Date): string {
  return join(reportsDir, REPORT_FOLDERS[workflow], `${pool}_report_${formatRunStamp(runStartedAt)}.txt`)
}

/**
 * Writes reports under `reportsDir`, stamped with the run's start time
 */
export class FileReportSink implements ReportSink {
  constructor(
    private readonly reportsDir: string,
    private readonly runStartedAt: Date
  ) {}

  write(workflow: Workflow, pool: string, content: string): string {
    const filePath = reportFilePath(this.reportsDir, workflow, pool, this.runStartedAt)
    mkdirSync(join(this.reportsDir, REPORT_FOLDERS[workflow]), { recursive: true })
    appendFileSync(filePath, content + '\n', 'utf-8')
    return filePath
  }
}
