/**
 * Spotify API Plugin
 *
 * Registers the Spotify Web API client used as the playlist sync catalog.
 */
import fp from 'fastify-plugin'
import type { FastifyInstance } from 'fastify'
import { SpotifyApiService } from '@services/spotify-api.service.js'

declare module 'fastify' {
  interface FastifyInstance {
    spotify: SpotifyApiService
  }
}

export default fp(
  async (fastify: FastifyInstance) => {
    const { config } = fastify
    fastify.decorate(
      'spotify',
      new SpotifyApiService(fastify.log, {
        accessToken: config.spotifyAccessToken,
        baseUrl: config.spotifyApiBaseUrl,
        market: config.spotifyMarket,
        timeoutMs: config.spotifyRequestTimeoutMs,
        maxRetries: config.spotifyMaxRetries,
      }),
    )
  },
  {
    name: 'spotify-api',
    dependencies: ['config'],
  },
)
