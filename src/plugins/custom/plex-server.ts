/**
 * Plex Server Plugin
 *
 * Registers the PlexServerService used for library scans and status
 */

import { PlexServerService } from '@utils/plex-server.js'
import type { FastifyInstance } from 'fastify'
import fp from 'fastify-plugin'

declare module 'fastify' {
  interface FastifyInstance {
    plexServerService: PlexServerService
  }
}

export default fp(
  async function plexServer(fastify: FastifyInstance) {
    const service = new PlexServerService(fastify.log, fastify)
    fastify.decorate('plexServerService', service)

    if (!service.isConfigured) {
      fastify.log.warn(
        'Plex server URL or token missing - library scans will fail until configured',
      )
    }
  },
  {
    name: 'plex-server',
    dependencies: ['config'],
  },
)
