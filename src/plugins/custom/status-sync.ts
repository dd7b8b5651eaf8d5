import { StatusSyncService } from '@services/status-sync.service.js'
import type { FastifyInstance } from 'fastify'
import fp from 'fastify-plugin'

declare module 'fastify' {
  interface FastifyInstance {
    statusSync: StatusSyncService
  }
}

export default fp(
  async (fastify: FastifyInstance) => {
    const service = new StatusSyncService(fastify.log, fastify)
    fastify.decorate('statusSync', service)

    fastify.addHook('onReady', async () => {
      await service.refresh()
      service.start(fastify.config.statusRefreshIntervalSeconds)
    })

    fastify.addHook('onClose', () => {
      service.stop()
    })
  },
  {
    name: 'status-sync',
    dependencies: ['config', 'activity-store', 'plex-server', 'discord-bot'],
  },
)
