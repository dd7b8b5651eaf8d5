/**
 * Scan Runner
 *
 * Executes scan requests against the library scanner and keeps their
 * records in the activity store current. Webhook scans for a target that
 * already has one in flight are folded into it.
 */

import type { ScanRequest } from '@root/types/scan.types.js'
import type { BatchAggregate } from '@root/types/webhook.types.js'
import type {
  ActivityStore,
  ScanUpdate,
} from '@services/activity-store.service.js'
import type { FastifyBaseLogger } from 'fastify'
import {
  completedUpdate,
  createScanRequest,
  failedUpdate,
  scanTargetKey,
} from './scan-requests.js'

export interface InFlightScan {
  scanId: string
  promise: Promise<ScanRequest>
}

export interface ScanRunnerDeps {
  logger: FastifyBaseLogger
  store: Pick<ActivityStore, 'addScan' | 'updateScan' | 'getScan'>
  /** Pending webhook scans by target key */
  inFlight: Map<string, InFlightScan>
}

/**
 * Records the scan, performs it, and resolves with the final record.
 * Never rejects: a failure marks the scan failed with the error message.
 */
export async function runScan(
  scan: ScanRequest,
  perform: () => Promise<void>,
  deps: Pick<ScanRunnerDeps, 'logger' | 'store'>,
): Promise<ScanRequest> {
  const { logger, store } = deps
  store.addScan(scan)

  let update: ScanUpdate
  try {
    await perform()
    update = completedUpdate()
    logger.info(
      {
        scanId: scan.scanId,
        library: scan.libraryName ?? 'all',
        itemKey: scan.itemKey,
      },
      'Plex scan completed',
    )
  } catch (error) {
    update = failedUpdate(error)
    logger.error(
      { error, scanId: scan.scanId, library: scan.libraryName ?? 'all' },
      'Plex scan failed',
    )
  }

  return store.updateScan(scan.scanId, update) ?? { ...scan, ...update }
}

/**
 * Starts a webhook-triggered scan of `libraryName`, or joins the one
 * already pending for that target.
 */
export function requestFlushScan(
  aggregate: BatchAggregate,
  libraryName: string | null,
  perform: () => Promise<void>,
  deps: ScanRunnerDeps,
): Promise<ScanRequest> {
  const { logger, store, inFlight } = deps
  const key = scanTargetKey(libraryName)

  const existing = inFlight.get(key)
  if (existing) {
    const current = store.getScan(existing.scanId)
    if (current && !current.mediaTitles.includes(aggregate.title)) {
      store.updateScan(existing.scanId, {
        mediaTitles: [...current.mediaTitles, aggregate.title],
      })
    }
    logger.debug(
      { scanId: existing.scanId, mediaKey: aggregate.mediaKey, target: key },
      'Scan already pending for target, folding flush into it',
    )
    return existing.promise
  }

  const scan = createScanRequest({
    libraryName,
    trigger: 'webhook',
    mediaTitles: [aggregate.title],
  })

  // The entry is released in a later microtask, after it was registered
  const promise = runScan(scan, perform, deps).then((result) => {
    if (inFlight.get(key)?.scanId === scan.scanId) {
      inFlight.delete(key)
    }
    return result
  })
  inFlight.set(key, { scanId: scan.scanId, promise })

  return promise
}
