/**
 * Scan request records and their state transitions
 */

import { randomUUID } from 'node:crypto'
import type {
  ScanRequest,
  ScanTrigger,
} from '@root/types/scan.types.js'
import type { ScanUpdate } from '@services/activity-store.service.js'

export interface NewScanRequest {
  libraryName: string | null
  itemKey?: string | null
  trigger: ScanTrigger
  mediaTitles?: string[]
}

export function createScanRequest(input: NewScanRequest): ScanRequest {
  return {
    scanId: randomUUID(),
    libraryName: input.libraryName,
    itemKey: input.itemKey ?? null,
    status: 'pending',
    trigger: input.trigger,
    mediaTitles: input.mediaTitles ?? [],
    timestamp: new Date().toISOString(),
    completedAt: null,
  }
}

export function completedUpdate(): ScanUpdate {
  return { status: 'completed', completedAt: new Date().toISOString() }
}

export function failedUpdate(error: unknown): ScanUpdate {
  return {
    status: 'failed',
    message: error instanceof Error ? error.message : String(error),
    completedAt: new Date().toISOString(),
  }
}

/**
 * Key identifying what a scan covers, used to fold overlapping requests
 */
export function scanTargetKey(libraryName: string | null): string {
  return libraryName === null ? '*' : `library:${libraryName.toLowerCase()}`
}
