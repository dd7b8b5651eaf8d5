import fp from 'fastify-plugin'
import cors from '@fastify/cors'
import type { FastifyInstance } from 'fastify'
import type { FastifyCorsOptions } from '@fastify/cors'

const createCorsConfig = (fastify: FastifyInstance): FastifyCorsOptions => {
  const urlObject = new URL(fastify.config.baseUrl)
  const isLocal =
    urlObject.hostname === 'localhost' || urlObject.hostname === '127.0.0.1'
  const { protocol, hostname } = urlObject
  const { port } = fastify.config

  // The dashboard is served from elsewhere and polls this API
  const origins = isLocal
    ? [
        `http://localhost:${port}`,
        `http://127.0.0.1:${port}`,
        'http://localhost:5173',
        'http://127.0.0.1:5173',
      ]
    : [`${protocol}//${hostname}`, `${protocol}//${hostname}:${port}`]

  return {
    origin: origins,
    methods: ['GET', 'POST', 'OPTIONS'],
    allowedHeaders: ['Origin', 'X-Requested-With', 'Content-Type', 'Accept'],
  }
}

export default fp(
  async (fastify: FastifyInstance) => {
    await fastify.register(cors, createCorsConfig(fastify))
  },
  {
    dependencies: ['config'],
  },
)
