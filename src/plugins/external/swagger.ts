import fp from 'fastify-plugin'
import apiReference from '@scalar/fastify-api-reference'
import fastifySwagger from '@fastify/swagger'
import {
  serializerCompiler,
  validatorCompiler,
  jsonSchemaTransform,
} from 'fastify-type-provider-zod'
import type { FastifyInstance } from 'fastify'
import { APP_VERSION } from '@utils/version.js'

const createOpenapiConfig = (fastify: FastifyInstance) => {
  fastify.log.debug(
    `Configuring OpenAPI with base URL: ${fastify.config.baseUrl}`,
  )

  return {
    openapi: {
      info: {
        title: 'arrbridge API',
        description:
          'Webhook intake for Sonarr, Radarr and Readarr plus the dashboard API for notifications and Plex scans',
        version: APP_VERSION,
      },
      servers: [
        {
          url: fastify.config.baseUrl,
          description: 'Primary Server',
        },
        {
          url: `http://localhost:${fastify.config.port}`,
          description: 'Localhost Access (with port)',
        },
      ],
      tags: [
        {
          name: 'Webhooks',
          description: 'Sonarr, Radarr and Readarr webhook intake',
        },
        {
          name: 'Activity',
          description: 'Recent notifications, scans and pending batches',
        },
        {
          name: 'Plex',
          description: 'Plex library and scan endpoints',
        },
        {
          name: 'System',
          description: 'Health and status endpoints',
        },
      ],
    },
    hideUntagged: true,
    transform: jsonSchemaTransform,
  }
}

export default fp(
  async (fastify: FastifyInstance) => {
    // Set up Zod validators
    fastify.setValidatorCompiler(validatorCompiler)
    fastify.setSerializerCompiler(serializerCompiler)

    /**
     * @see {@link https://github.com/fastify/fastify-swagger}
     */
    await fastify.register(fastifySwagger, createOpenapiConfig(fastify))

    await fastify.register(apiReference, {
      routePrefix: '/api/docs',
    })
  },
  {
    dependencies: ['config'],
  },
)
