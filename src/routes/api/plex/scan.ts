import {
  ErrorSchema,
  ScanAllResponseSchema,
  ScanItemBodySchema,
  ScanLibraryBodySchema,
  ScanResponseSchema,
} from '@schemas/plex/scan.schema.js'
import type { PlexLibrary } from '@root/types/plex-server.types.js'
import { logRouteError } from '@utils/route-errors.js'
import type { FastifyPluginAsyncZodOpenApi } from 'fastify-zod-openapi'

const plugin: FastifyPluginAsyncZodOpenApi = async (fastify) => {
  fastify.post(
    '/scan',
    {
      schema: {
        summary: 'Scan a Plex library',
        operationId: 'scanPlexLibrary',
        description:
          'Starts a scan of one library by title. The returned record is failed, not an error response, when Plex rejects the scan.',
        body: ScanLibraryBodySchema,
        response: {
          200: ScanResponseSchema,
          404: ErrorSchema,
          503: ErrorSchema,
        },
        tags: ['Plex'],
      },
    },
    async (request, reply) => {
      const { library } = request.body

      let found: PlexLibrary | undefined
      try {
        found = await fastify.plexServerService.findLibrary(library)
      } catch (error) {
        logRouteError(fastify.log, request, error, {
          message: 'Failed to look up Plex library',
          context: { library },
        })
        return reply.serviceUnavailable('Unable to reach the Plex server')
      }
      if (!found) {
        return reply.notFound(`Plex library "${library}" not found`)
      }

      const scan = await fastify.scanCoordinator.scanLibrary(found.title)
      return { scan }
    },
  )

  fastify.post(
    '/scan/all',
    {
      schema: {
        summary: 'Scan every Plex library',
        operationId: 'scanAllPlexLibraries',
        description:
          'Starts a scan of each library in turn and reports the outcome per library',
        response: {
          200: ScanAllResponseSchema,
          503: ErrorSchema,
        },
        tags: ['Plex'],
      },
    },
    async (_request, reply) => {
      if (!fastify.plexServerService.isConfigured) {
        return reply.serviceUnavailable('Plex server is not configured')
      }
      const results = await fastify.scanCoordinator.scanAllLibraries()
      return { results }
    },
  )

  fastify.post(
    '/scan/item',
    {
      schema: {
        summary: 'Refresh a Plex item',
        operationId: 'scanPlexItem',
        description:
          'Refreshes a single show, season, movie or album by its rating key',
        body: ScanItemBodySchema,
        response: {
          200: ScanResponseSchema,
        },
        tags: ['Plex'],
      },
    },
    async (request) => {
      const scan = await fastify.scanCoordinator.scanItem(request.body.itemKey)
      return { scan }
    },
  )
}

export default plugin
