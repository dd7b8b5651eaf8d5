import { ActivityStore } from '@services/activity-store.service.js'
import type { FastifyInstance } from 'fastify'
import fp from 'fastify-plugin'

declare module 'fastify' {
  interface FastifyInstance {
    activityStore: ActivityStore
  }
}

export default fp(
  async (fastify: FastifyInstance) => {
    const store = new ActivityStore(fastify.log, {
      retentionHours: fastify.config.activityRetentionHours,
    })
    fastify.decorate('activityStore', store)

    const pruneInterval = setInterval(() => {
      store.prune()
    }, fastify.config.activityPruneIntervalSeconds * 1000)
    pruneInterval.unref()

    fastify.addHook('onClose', () => {
      clearInterval(pruneInterval)
    })
  },
  {
    name: 'activity-store',
    dependencies: ['config'],
  },
)
