/**
 * Activity Store
 *
 * In-memory record of recent notifications, scan requests and the
 * Plex/Discord connectivity snapshot, polled by the dashboard.
 * Nothing survives a restart.
 */

import type { StatusSnapshot } from '@root/types/activity.types.js'
import type {
  NotificationRecord,
  UserNotificationCount,
} from '@root/types/notification.types.js'
import type { ScanRequest, ScanStatus } from '@root/types/scan.types.js'
import { createServiceLogger } from '@utils/logger.js'
import type { FastifyBaseLogger } from 'fastify'

export interface ActivityStoreConfig {
  retentionHours: number
}

export type ScanUpdate = Partial<
  Pick<ScanRequest, 'status' | 'message' | 'completedAt' | 'mediaTitles'>
>

export interface NotificationFilter {
  hours?: number
  /** Only notifications that mentioned this Discord user */
  userId?: string
}

export interface PruneResult {
  notifications: number
  scans: number
}

const HOUR_MS = 60 * 60 * 1000

export class ActivityStore {
  private readonly log: FastifyBaseLogger
  private readonly _config: ActivityStoreConfig
  /** Newest first */
  private notifications: NotificationRecord[] = []
  private readonly scans = new Map<string, ScanRequest>()
  private status: StatusSnapshot = {
    plexConnected: false,
    plexVersion: null,
    discordConnected: false,
    libraries: [],
    lastCheckedAt: null,
  }

  constructor(baseLog: FastifyBaseLogger, config?: Partial<ActivityStoreConfig>) {
    this.log = createServiceLogger(baseLog, 'ACTIVITY')
    this._config = {
      retentionHours: config?.retentionHours ?? 24,
    }
  }

  get config(): ActivityStoreConfig {
    return this._config
  }

  recordNotification(record: NotificationRecord): void {
    this.notifications.unshift(record)
  }

  /**
   * Notifications created within the last `hours`, newest first
   */
  listNotifications(filter: NotificationFilter = {}): NotificationRecord[] {
    const { hours = this._config.retentionHours, userId } = filter
    const cutoff = Date.now() - hours * HOUR_MS
    return this.notifications.filter(
      (record) =>
        Date.parse(record.timestamp) >= cutoff &&
        (!userId || record.mentionedUserIds.includes(userId)),
    )
  }

  /**
   * How often each mentioned user was notified within the last `hours`,
   * most notified first, ties broken by the latest notification
   */
  countNotificationsByUser(
    hours = this._config.retentionHours,
  ): UserNotificationCount[] {
    const counts = new Map<string, UserNotificationCount>()

    // Records are newest first, so a user's first record is their latest
    for (const record of this.listNotifications({ hours })) {
      for (const discordUserId of record.mentionedUserIds) {
        const existing = counts.get(discordUserId)
        if (existing) {
          existing.notificationCount++
          continue
        }
        counts.set(discordUserId, {
          discordUserId,
          notificationCount: 1,
          lastNotificationAt: record.timestamp,
        })
      }
    }

    return [...counts.values()].sort(
      (a, b) =>
        b.notificationCount - a.notificationCount ||
        b.lastNotificationAt.localeCompare(a.lastNotificationAt),
    )
  }

  addScan(scan: ScanRequest): void {
    this.scans.set(scan.scanId, scan)
  }

  /**
   * Replace a scan with an updated copy. Records handed out earlier are
   * never mutated.
   */
  updateScan(scanId: string, update: ScanUpdate): ScanRequest | undefined {
    const current = this.scans.get(scanId)
    if (!current) {
      this.log.debug({ scanId }, 'Update for unknown scan ignored')
      return undefined
    }
    const next: ScanRequest = { ...current, ...update }
    this.scans.set(scanId, next)
    return next
  }

  getScan(scanId: string): ScanRequest | undefined {
    return this.scans.get(scanId)
  }

  /**
   * Scans newest first, optionally limited to one status
   */
  listScans(filter: { status?: ScanStatus } = {}): ScanRequest[] {
    return [...this.scans.values()]
      .filter((scan) => !filter.status || scan.status === filter.status)
      .sort((a, b) => b.timestamp.localeCompare(a.timestamp))
  }

  countScans(status: ScanStatus): number {
    let count = 0
    for (const scan of this.scans.values()) {
      if (scan.status === status) count++
    }
    return count
  }

  setStatus(update: Partial<StatusSnapshot>): StatusSnapshot {
    this.status = { ...this.status, ...update }
    return this.status
  }

  getStatus(): StatusSnapshot {
    return this.status
  }

  /**
   * Drop notifications and finished scans older than the retention window.
   * Pending scans stay until they resolve.
   */
  prune(now: number = Date.now()): PruneResult {
    const cutoff = now - this._config.retentionHours * HOUR_MS

    const before = this.notifications.length
    this.notifications = this.notifications.filter(
      (record) => Date.parse(record.timestamp) >= cutoff,
    )

    let scans = 0
    for (const [scanId, scan] of this.scans) {
      if (scan.status !== 'pending' && Date.parse(scan.timestamp) < cutoff) {
        this.scans.delete(scanId)
        scans++
      }
    }

    const result = { notifications: before - this.notifications.length, scans }
    if (result.notifications > 0 || result.scans > 0) {
      this.log.debug(result, 'Pruned expired activity records')
    }
    return result
  }
}
