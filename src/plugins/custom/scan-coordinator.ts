import { ScanCoordinatorService } from '@services/scan-coordinator.service.js'
import type { FastifyInstance } from 'fastify'
import fp from 'fastify-plugin'

declare module 'fastify' {
  interface FastifyInstance {
    scanCoordinator: ScanCoordinatorService
  }
}

export default fp(
  async (fastify: FastifyInstance) => {
    fastify.decorate(
      'scanCoordinator',
      new ScanCoordinatorService(fastify.log, fastify),
    )
  },
  {
    name: 'scan-coordinator',
    dependencies: ['config', 'activity-store', 'plex-server'],
  },
)
