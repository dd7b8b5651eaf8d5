import {
  ErrorSchema,
  WebhookBodySchema,
  WebhookParamsSchema,
  WebhookResponseSchema,
} from '@schemas/webhooks/webhook.schema.js'
import type { FastifyPluginAsyncZodOpenApi } from 'fastify-zod-openapi'

const plugin: FastifyPluginAsyncZodOpenApi = async (fastify) => {
  // Unreadable JSON reaches the normalizer as raw text and is dropped there
  fastify.addContentTypeParser<string>(
    'application/json',
    { parseAs: 'string' },
    (request, body, done) => {
      try {
        done(null, JSON.parse(body))
      } catch (error) {
        request.log.debug({ error }, 'Webhook body is not valid JSON')
        done(null, body)
      }
    },
  )

  fastify.post(
    '/:source',
    {
      schema: {
        summary: 'Receive an *Arr webhook',
        operationId: 'receiveArrWebhook',
        description:
          'Accepts Sonarr, Radarr and Readarr webhook payloads. Imports are batched per series, movie or book and announced once the debounce window passes. Every readable payload is acknowledged, including ignored and malformed ones.',
        params: WebhookParamsSchema,
        body: WebhookBodySchema,
        response: {
          200: WebhookResponseSchema,
          400: ErrorSchema,
        },
        tags: ['Webhooks'],
      },
    },
    async (request) => {
      const { source } = request.params
      const result = fastify.webhookQueue.handleWebhook(request.body, source)

      request.log.debug(
        { source, status: result.status },
        'Webhook processed',
      )

      return { success: true }
    },
  )
}

export default plugin
