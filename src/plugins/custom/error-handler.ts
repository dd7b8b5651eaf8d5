import type { ErrorResponse } from '@root/schemas/common/error.schema.js'
import type { FastifyError, FastifyInstance } from 'fastify'
import fp from 'fastify-plugin'

const ERROR_LABELS: Record<number, string> = {
  400: 'Bad Request',
  404: 'Not Found',
  429: 'Too Many Requests',
  500: 'Internal Server Error',
  503: 'Service Unavailable',
}

/**
 * Global error handler plugin.
 * Schema validation failures become 400s; anything unexpected is a 500
 * whose details stay in the log.
 */
async function errorHandler(fastify: FastifyInstance) {
  fastify.setErrorHandler((err: FastifyError, request, reply) => {
    const statusCode = err.validation ? 400 : (err.statusCode ?? 500)
    // Avoid logging query/params to prevent leaking tokens
    const logData = {
      err,
      request: {
        id: request.id,
        method: request.method,
        path: request.url.split('?')[0],
        route: request.routeOptions?.url,
      },
    }

    if (statusCode >= 500) {
      request.log.error(logData, 'Internal server error occurred')
    } else {
      request.log.warn(logData, 'Client error occurred')
    }

    // Deliberate 5xx replies such as 503 keep their message
    const hideDetails = statusCode === 500
    const payload: ErrorResponse = {
      statusCode,
      code: err.code || (err.validation ? 'FST_ERR_VALIDATION' : 'GENERIC_ERROR'),
      error:
        ERROR_LABELS[statusCode] ??
        (statusCode >= 500 ? 'Server Error' : 'Client Error'),
      message: hideDetails
        ? 'Internal Server Error'
        : err.message || 'An error occurred',
    }
    return reply.code(statusCode).send(payload)
  })
}

export default fp(errorHandler, {
  name: 'error-handler',
})
