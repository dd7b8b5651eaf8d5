import {
  ScansQuerySchema,
  ScansResponseSchema,
} from '@schemas/activity/activity.schema.js'
import type { FastifyPluginAsyncZodOpenApi } from 'fastify-zod-openapi'

const plugin: FastifyPluginAsyncZodOpenApi = async (fastify) => {
  fastify.get(
    '/scans',
    {
      schema: {
        summary: 'List recent Plex scans',
        operationId: 'listScans',
        description:
          'Webhook and manual scan requests, newest first, optionally filtered by status',
        querystring: ScansQuerySchema,
        response: {
          200: ScansResponseSchema,
        },
        tags: ['Activity'],
      },
    },
    async (request) => {
      return {
        scans: fastify.activityStore.listScans({ status: request.query.status }),
      }
    },
  )
}

export default plugin
