import fp from 'fastify-plugin'
import env from '@fastify/env'
import type { FastifyInstance } from 'fastify'
import type { Config } from '@root/types/config.types.js'
import { validLogLevels } from '@utils/logger.js'

declare module 'fastify' {
  interface FastifyInstance {
    config: Config
  }
}

const DEFAULT_DESCRIPTION_TEMPLATE =
  'Release Radar playlists with songs from albums included. Updated on {date}.'

const schema = {
  type: 'object',
  required: ['port'],
  properties: {
    baseUrl: {
      type: 'string',
      default: 'http://localhost',
    },
    port: {
      type: 'number',
      default: 3003,
    },
    logLevel: {
      type: 'string',
      enum: validLogLevels,
      default: 'info',
    },
    logDestination: {
      type: 'string',
      enum: ['terminal', 'file', 'both'],
      default: 'terminal',
    },
    closeGraceDelay: {
      type: 'number',
      default: 10000,
    },
    spotifyAccessToken: {
      type: 'string',
      default: '',
    },
    spotifyApiBaseUrl: {
      type: 'string',
      default: 'https://api.spotify.com/v1',
    },
    spotifyMarket: {
      type: 'string',
      default: '',
    },
    spotifyRequestTimeoutMs: {
      type: 'number',
      default: 15000,
    },
    spotifyMaxRetries: {
      type: 'number',
      default: 3,
    },
    referencePlaylistId: {
      type: 'string',
      default: '',
    },
    targetPlaylistId: {
      type: 'string',
      default: '',
    },
    stockPlaylistId: {
      type: 'string',
      default: '',
    },
    allowDuplicates: {
      type: 'boolean',
      default: false,
    },
    wipeReference: {
      type: 'boolean',
      default: true,
    },
    removeSavedTracks: {
      type: 'boolean',
      default: false,
    },
    blacklistArtists: {
      type: 'string',
      default: '[]',
    },
    albumReadConcurrency: {
      type: 'number',
      minimum: 1,
      default: 1,
    },
    descriptionTemplate: {
      type: 'string',
      default: DEFAULT_DESCRIPTION_TEMPLATE,
    },
    syncSchedule: {
      type: 'string',
      default: '',
    },
  },
}

export default fp(
  async (fastify: FastifyInstance) => {
    await fastify.register(env, {
      confKey: 'config',
      schema,
      dotenv: {
        path: './.env',
        debug: process.env.NODE_ENV === 'development',
      },
      data: process.env,
    })

    if (!fastify.config.spotifyAccessToken) {
      fastify.log.warn(
        'spotifyAccessToken is not set; Spotify requests will be rejected',
      )
    }
  },
  {
    name: 'config',
  },
)
