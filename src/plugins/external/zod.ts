import fp from 'fastify-plugin'
import {
  serializerCompiler,
  validatorCompiler,
} from 'fastify-type-provider-zod'
import type { FastifyInstance } from 'fastify'

export default fp(
  async (fastify: FastifyInstance) => {
    fastify.setValidatorCompiler(validatorCompiler)
    fastify.setSerializerCompiler(serializerCompiler)
  },
  {
    name: 'zod-compilers',
  },
)
