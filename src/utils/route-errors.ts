import type { FastifyBaseLogger, FastifyRequest } from 'fastify'

interface RouteErrorOptions {
  message?: string
  context?: Record<string, unknown>
}

/**
 * Logs a route failure with the method and route pattern attached.
 * Query strings are left out so tokens never reach the log.
 */
export function logRouteError(
  log: FastifyBaseLogger,
  request: FastifyRequest,
  error: unknown,
  options: RouteErrorOptions = {},
): void {
  const routePath = request.routeOptions?.url ?? request.url.split('?')[0]
  const route = `${request.method} ${routePath}`

  log.error(
    {
      error,
      route,
      ...options.context,
    },
    options.message ?? `Error in route ${route}`,
  )
}
