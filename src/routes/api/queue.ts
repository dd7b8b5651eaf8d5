import { QueueResponseSchema } from '@schemas/activity/activity.schema.js'
import type { FastifyPluginAsyncZodOpenApi } from 'fastify-zod-openapi'

const plugin: FastifyPluginAsyncZodOpenApi = async (fastify) => {
  fastify.get(
    '/queue',
    {
      schema: {
        summary: 'List pending batches',
        operationId: 'listPendingBatches',
        description:
          'Imports still inside their debounce window, waiting to be announced',
        response: {
          200: QueueResponseSchema,
        },
        tags: ['Activity'],
      },
    },
    async () => {
      return { batches: fastify.webhookQueue.getPendingBatches() }
    },
  )
}

export default plugin
