/**
 * Scan Coordinator Service
 *
 * Decides which Plex library to scan when a batch flushes, folds
 * overlapping webhook scans together, and serves manual scans.
 */

import type {
  LibraryScanResult,
  ScanRequest,
} from '@root/types/scan.types.js'
import type { BatchAggregate } from '@root/types/webhook.types.js'
import {
  describeScanFailures,
  type LibraryScanner,
} from '@utils/plex-server.js'
import { createServiceLogger } from '@utils/logger.js'
import type { FastifyBaseLogger, FastifyInstance } from 'fastify'
import {
  createScanRequest,
  type InFlightScan,
  requestFlushScan,
  resolveScanTarget,
  runScan,
  type ScanRunnerDeps,
} from './scan-coordinator/index.js'

export class ScanCoordinatorService {
  private readonly log: FastifyBaseLogger
  private readonly inFlight = new Map<string, InFlightScan>()

  constructor(
    baseLog: FastifyBaseLogger,
    private readonly fastify: FastifyInstance,
    private readonly scanner: LibraryScanner = fastify.plexServerService,
  ) {
    this.log = createServiceLogger(baseLog, 'SCAN')
  }

  private get runnerDeps(): ScanRunnerDeps {
    return {
      logger: this.log,
      store: this.fastify.activityStore,
      inFlight: this.inFlight,
    }
  }

  /** Webhook scans currently waiting on Plex */
  get pendingCount(): number {
    return this.inFlight.size
  }

  /**
   * Flush consumer. Resolves with the scan covering this batch, or null
   * when scanning on import is disabled.
   */
  async onFlush(aggregate: BatchAggregate): Promise<ScanRequest | null> {
    if (!this.fastify.config.scanOnImport) {
      this.log.debug(
        { mediaKey: aggregate.mediaKey },
        'Scan on import disabled, skipping',
      )
      return null
    }

    const libraryName = await resolveScanTarget(
      aggregate.mediaType,
      this.fastify.config,
      () => this.scanner.listLibraries(),
      this.log,
    )

    return requestFlushScan(
      aggregate,
      libraryName,
      () => this.scanner.scanLibrary(libraryName),
      this.runnerDeps,
    )
  }

  async scanLibrary(libraryName: string): Promise<ScanRequest> {
    const scan = createScanRequest({ libraryName, trigger: 'manual' })
    return runScan(
      scan,
      () => this.scanner.scanLibrary(libraryName),
      this.runnerDeps,
    )
  }

  async scanItem(itemKey: string): Promise<ScanRequest> {
    const scan = createScanRequest({
      libraryName: null,
      itemKey,
      trigger: 'manual',
    })
    return runScan(scan, () => this.scanner.scanItem(itemKey), this.runnerDeps)
  }

  /**
   * Scans every library and reports each one. The whole run is recorded
   * as one manual scan, failed if any library failed.
   */
  async scanAllLibraries(): Promise<LibraryScanResult[]> {
    let results: LibraryScanResult[] = []
    const scan = createScanRequest({ libraryName: null, trigger: 'manual' })

    await runScan(
      scan,
      async () => {
        results = await this.scanner.scanEachLibrary()
        const failure = describeScanFailures(results)
        if (failure) {
          throw new Error(failure)
        }
      },
      this.runnerDeps,
    )

    return results
  }
}
