import { WebhookQueueService } from '@services/webhook-queue.service.js'
import type { FastifyInstance } from 'fastify'
import fp from 'fastify-plugin'

declare module 'fastify' {
  interface FastifyInstance {
    webhookQueue: WebhookQueueService
  }
}

export default fp(
  async (fastify: FastifyInstance) => {
    const service = new WebhookQueueService(fastify.log, fastify, {
      debounceSeconds: fastify.config.debounceSeconds,
    })
    fastify.decorate('webhookQueue', service)

    // Announce whatever is still buffered before the consumers go away
    fastify.addHook('preClose', async () => {
      try {
        await service.drain()
      } catch (error) {
        fastify.log.error({ error }, 'Failed to flush pending batches on close')
      }
    })

    fastify.addHook('onClose', () => {
      service.shutdown()
    })
  },
  {
    name: 'webhook-queue',
    dependencies: [
      'config',
      'scan-coordinator',
      'notification-dispatcher',
    ],
  },
)
