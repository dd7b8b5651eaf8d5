import { StatusResponseSchema } from '@schemas/activity/activity.schema.js'
import type { FastifyPluginAsyncZodOpenApi } from 'fastify-zod-openapi'

const plugin: FastifyPluginAsyncZodOpenApi = async (fastify) => {
  fastify.get(
    '/status',
    {
      schema: {
        summary: 'Get bridge status',
        operationId: 'getStatus',
        description:
          'Plex and Discord connectivity from the last status refresh, with queue and scan counters',
        response: {
          200: StatusResponseSchema,
        },
        tags: ['System'],
      },
    },
    async () => {
      return {
        ...fastify.activityStore.getStatus(),
        // Live gateway state rather than the last refresh
        discordConnected: fastify.discord.isConnected(),
        pendingBatches: fastify.webhookQueue.pendingCount,
        pendingScans: fastify.activityStore.countScans('pending'),
        debounceSeconds: fastify.webhookQueue.config.debounceSeconds,
      }
    },
  )
}

export default plugin
