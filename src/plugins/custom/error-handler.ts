import type { ErrorResponse } from '@root/schemas/common/error.schema.js'
import { ReconciliationError } from '@services/playlist-sync/errors.js'
import { SpotifyApiError } from '@services/spotify-api.service.js'
import type { FastifyError, FastifyInstance } from 'fastify'
import fp from 'fastify-plugin'

const RECONCILIATION_STATUS: Record<string, number> = {
  CONFIGURATION_ERROR: 400,
  RECONCILIATION_IN_PROGRESS: 409,
  REMOTE_FETCH_ERROR: 502,
  REMOTE_WRITE_ERROR: 502,
}

const STATUS_TEXT: Record<number, string> = {
  400: 'Bad Request',
  409: 'Conflict',
  502: 'Bad Gateway',
}

/**
 * HTTP status for an error thrown out of a route
 */
export function statusCodeFor(err: FastifyError | Error): number {
  if (err instanceof ReconciliationError) {
    return RECONCILIATION_STATUS[err.code] ?? 500
  }
  if (err instanceof SpotifyApiError) {
    return 502
  }
  return 'statusCode' in err && typeof err.statusCode === 'number'
    ? err.statusCode
    : 500
}

/**
 * Global error handler plugin.
 * Provides consistent error responses and appropriate logging.
 */
async function errorHandler(fastify: FastifyInstance) {
  fastify.setErrorHandler((err: FastifyError | Error, request, reply) => {
    const statusCode = statusCodeFor(err)
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
    reply.code(statusCode)

    // Upstream and reconciliation failures are safe to describe
    const exposeMessage =
      statusCode < 500 ||
      err instanceof ReconciliationError ||
      err instanceof SpotifyApiError
    const payload: ErrorResponse = {
      statusCode,
      code:
        err instanceof ReconciliationError
          ? err.code
          : err instanceof SpotifyApiError
            ? 'SPOTIFY_API_ERROR'
            : 'code' in err && err.code
              ? err.code
              : 'GENERIC_ERROR',
      error:
        STATUS_TEXT[statusCode] ??
        (statusCode >= 500 ? 'Internal Server Error' : 'Client Error'),
      message: exposeMessage
        ? err.message || 'An error occurred'
        : 'Internal Server Error',
    }
    return payload
  })
}

export default fp(errorHandler, {
  name: 'error-handler',
})
