import { NotificationDispatcherService } from '@services/notification-dispatcher.service.js'
import type { FastifyInstance } from 'fastify'
import fp from 'fastify-plugin'

declare module 'fastify' {
  interface FastifyInstance {
    notificationDispatcher: NotificationDispatcherService
  }
}

export default fp(
  async (fastify: FastifyInstance) => {
    fastify.decorate(
      'notificationDispatcher',
      new NotificationDispatcherService(fastify.log, fastify),
    )
  },
  {
    name: 'notification-dispatcher',
    dependencies: ['config', 'activity-store', 'discord-bot'],
  },
)
