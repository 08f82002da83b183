import fp from 'fastify-plugin'
import type { FastifyInstance } from 'fastify'
import { BlacklistArtistsSchema } from '@schemas/playlist-sync/playlist-sync.schema.js'
import { ConfigBlacklistStore } from '@services/playlist-sync/filtering/index.js'

declare module 'fastify' {
  interface FastifyInstance {
    blacklist: ConfigBlacklistStore
  }
}

/**
 * Parses the `blacklistArtists` setting. Malformed JSON or entries fail
 * startup rather than silently disabling the blacklist.
 */
export function parseBlacklistArtists(raw: string) {
  let json: unknown
  try {
    json = JSON.parse(raw || '[]')
  } catch (error) {
    throw new Error('blacklistArtists must be a JSON array', { cause: error })
  }
  const parsed = BlacklistArtistsSchema.safeParse(json)
  if (!parsed.success) {
    throw new Error(`Invalid blacklistArtists: ${parsed.error.message}`)
  }
  return parsed.data
}

export default fp(
  async (fastify: FastifyInstance) => {
    const store = new ConfigBlacklistStore(
      parseBlacklistArtists(fastify.config.blacklistArtists),
    )
    fastify.log.info(`Loaded ${store.size} blacklisted artist entries`)
    fastify.decorate('blacklist', store)
  },
  {
    name: 'blacklist',
    dependencies: ['config'],
  },
)
