import {
  type HealthCheckResponse,
  HealthCheckResponseSchema,
} from '@schemas/health/health.schema.js'
import type { FastifyPluginAsync } from 'fastify'

const plugin: FastifyPluginAsync = async (fastify) => {
  fastify.get<{
    Reply: HealthCheckResponse
  }>(
    '/health',
    {
      schema: {
        summary: 'Health check endpoint',
        operationId: 'getHealth',
        description:
          'Returns the health status of the application. Unhealthy when no Spotify access token is configured.',
        response: {
          200: HealthCheckResponseSchema,
          503: HealthCheckResponseSchema,
        },
        tags: ['System'],
      },
    },
    async (_request, reply) => {
      const spotifyToken = fastify.config.spotifyAccessToken ? 'ok' : 'missing'
      const isHealthy = spotifyToken === 'ok'

      return reply.status(isHealthy ? 200 : 503).send({
        status: isHealthy ? 'healthy' : 'unhealthy',
        timestamp: new Date().toISOString(),
        checks: {
          spotifyToken,
          playlistSync: fastify.playlistSync.isRunning ? 'running' : 'idle',
        },
      })
    },
  )
}

export default plugin
