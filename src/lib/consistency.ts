/**
 * Consistency waits
 *
 * The appliance and the catalog expose no readiness signal, so mutating
 * calls are followed by a fixed pause. Every pause goes through a
 * ConsistencyPolicy, which lets a poll-until-ready policy replace the
 * fixed one without touching the pipeline.
 */

import type { SettleKind } from '../types.js'

/** Fixed pause per kind, in seconds */
export const DEFAULT_SETTLE_SECONDS: Record<SettleKind, number> = {
  'catalog-delete': 60,
  'catalog-confirm': 50,
  import: 60,
  label: 60
}

export interface ConsistencyPolicy {
  /**
   * Wait until downstream systems have caught up with a `kind` mutation.
   * `timeoutMs` overrides the policy's own duration for this call.
   */
  awaitConsistency(kind: SettleKind, timeoutMs?: number): Promise<void>
}

export type SleepFn = (ms: number) => Promise<void>

export const sleep: SleepFn = (ms) => new Promise(resolve => setTimeout(resolve, ms))

/**
 * Unconditional sleeps of a fixed duration per kind
 */
export function fixedDelayPolicy(
  seconds: Record<SettleKind, number> = DEFAULT_SETTLE_SECONDS,
  sleepFn: SleepFn = sleep
): ConsistencyPolicy {
  return {
    async awaitConsistency(kind: SettleKind, timeoutMs?: number): Promise<void> {
      const ms = timeoutMs ?? seconds[kind] * 1000
      if (ms > 0) {
        await sleepFn(ms)
      }
    }
  }
}

/**
 * Returns immediately. Used by dry runs and tests.
 */
export const immediatePolicy: ConsistencyPolicy = {
  async awaitConsistency(): Promise<void> {}
}
