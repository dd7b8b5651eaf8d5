/**
 * Status Sync Service
 *
 * Keeps the activity store's connectivity snapshot current by polling
 * Plex and reading the Discord gateway state.
 */

import type { StatusSnapshot } from '@root/types/activity.types.js'
import { createServiceLogger } from '@utils/logger.js'
import type { FastifyBaseLogger, FastifyInstance } from 'fastify'

export class StatusSyncService {
  private readonly log: FastifyBaseLogger
  private interval: NodeJS.Timeout | null = null

  constructor(
    baseLog: FastifyBaseLogger,
    private readonly fastify: FastifyInstance,
  ) {
    this.log = createServiceLogger(baseLog, 'STATUS')
  }

  /**
   * Re-reads Plex identity and libraries. A Plex failure is recorded as
   * disconnected rather than thrown.
   */
  async refresh(): Promise<StatusSnapshot> {
    const { plexServerService, discord, activityStore } = this.fastify
    const lastCheckedAt = new Date().toISOString()
    const discordConnected = discord.isConnected()

    if (!plexServerService.isConfigured) {
      return activityStore.setStatus({
        plexConnected: false,
        plexVersion: null,
        libraries: [],
        discordConnected,
        lastCheckedAt,
      })
    }

    try {
      const [identity, libraries] = await Promise.all([
        plexServerService.getIdentity(),
        plexServerService.listLibraries(),
      ])
      return activityStore.setStatus({
        plexConnected: true,
        plexVersion: identity.version,
        libraries,
        discordConnected,
        lastCheckedAt,
      })
    } catch (error) {
      const wasConnected = activityStore.getStatus().plexConnected
      this.log[wasConnected ? 'warn' : 'debug'](
        { error },
        'Plex server unreachable during status refresh',
      )
      return activityStore.setStatus({
        plexConnected: false,
        discordConnected,
        lastCheckedAt,
      })
    }
  }

  start(intervalSeconds: number): void {
    this.stop()
    this.interval = setInterval(() => {
      this.refresh().catch((error) => {
        this.log.error({ error }, 'Status refresh failed')
      })
    }, intervalSeconds * 1000)
    this.interval.unref()
  }

  stop(): void {
    if (this.interval) {
      clearInterval(this.interval)
      this.interval = null
    }
  }
}
