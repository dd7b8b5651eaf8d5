import {
  type HealthCheckResponse,
  HealthCheckResponseSchema,
} from '@schemas/health/health.schema.js'
import type { FastifyPluginAsyncZodOpenApi } from 'fastify-zod-openapi'

const plugin: FastifyPluginAsyncZodOpenApi = async (fastify) => {
  fastify.get(
    '/health',
    {
      schema: {
        summary: 'Health check endpoint',
        operationId: 'getHealth',
        description:
          'Liveness probe. Always 200 while the process serves requests; reports whether Plex and Discord are reachable.',
        response: {
          200: HealthCheckResponseSchema,
        },
        tags: ['System'],
      },
    },
    async (): Promise<HealthCheckResponse> => {
      let plexStatus: 'ok' | 'failed' = 'ok'

      try {
        await fastify.plexServerService.getIdentity()
      } catch (error) {
        fastify.log.debug({ error }, 'Health check: Plex server unreachable')
        plexStatus = 'failed'
      }

      const discordStatus = fastify.discord.isConnected() ? 'ok' : 'failed'

      return {
        status:
          plexStatus === 'ok' && discordStatus === 'ok' ? 'healthy' : 'degraded',
        timestamp: new Date().toISOString(),
        checks: {
          plex: plexStatus,
          discord: discordStatus,
        },
      }
    },
  )
}

export default plugin
