import path from 'node:path'
import { fileURLToPath } from 'node:url'
import fastifyAutoload from '@fastify/autoload'
import type { ErrorResponse } from '@root/schemas/common/error.schema.js'
import type { FastifyInstance, FastifyPluginOptions } from 'fastify'

const __dirname = path.dirname(fileURLToPath(import.meta.url))

export const options = {
  ajv: {
    customOptions: {
      coerceTypes: 'array',
      removeAdditional: 'all',
    },
  },
} as const

/**
 * Loads external plugins (config and validation), then the
 * service plugins, then the routes.
 */
export default async function serviceApp(
  fastify: FastifyInstance,
  opts: FastifyPluginOptions,
) {
  // Load external plugins
  await fastify.register(fastifyAutoload, {
    dir: path.join(__dirname, 'plugins/external'),
    options: {
      ...opts,
      timeout: 30000,
    },
  })

  // Load custom plugins
  fastify.register(fastifyAutoload, {
    dir: path.join(__dirname, 'plugins/custom'),
    options: {
      ...opts,
      timeout: 30000,
    },
  })

  // Load routes
  fastify.register(fastifyAutoload, {
    dir: path.join(__dirname, 'routes'),
    options: {
      ...opts,
      timeout: 30000,
    },
  })

  fastify.setNotFoundHandler((request, reply) => {
    request.log.warn(
      {
        request: {
          id: request.id,
          method: request.method,
          path: request.url.split('?')[0],
        },
      },
      'Resource not found',
    )
    reply.code(404)
    const payload: ErrorResponse = {
      statusCode: 404,
      code: 'NOT_FOUND',
      error: 'Not Found',
      message: 'Not Found',
    }
    return payload
  })
}
