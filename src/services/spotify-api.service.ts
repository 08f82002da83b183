/**
 * Spotify Web API client
 *
 * Implements the catalog contract the playlist sync engine reads and writes
 * through. Every response is validated with zod and mapped to the engine's
 * `Track` shape here, so nothing past this file sees Spotify JSON.
 *
 * Rate-limited requests (429) are retried after the `Retry-After` delay up to
 * `maxRetries` times. Any other non-2xx response becomes a `SpotifyApiError`.
 */

import { setTimeout as delay } from 'node:timers/promises'
import type { Track } from '@root/types/playlist-sync.types.js'
import type {
  CatalogAlbum,
  Page,
  SpotifyCatalog,
  SpotifyClientConfig,
} from '@root/types/spotify.types.js'
import {
  SpotifyAlbumTracksPageSchema,
  SpotifyAlbumsResponseSchema,
  SpotifyContainsResponseSchema,
  SpotifyErrorResponseSchema,
  SpotifyPlaylistTracksPageSchema,
  SpotifySnapshotResponseSchema,
  SpotifyTracksResponseSchema,
} from '@schemas/spotify/spotify.schema.js'
import { limitFor } from '@services/playlist-sync/batching/index.js'
import {
  toCatalogAlbum,
  toTrack,
  toTrackUri,
} from '@services/spotify/track-mapper.js'
import { createServiceLogger } from '@utils/logger.js'
import { toSpotifyId } from '@utils/spotify-id.js'
import type { FastifyBaseLogger } from 'fastify'
import type { z } from 'zod'

const DEFAULT_RETRY_AFTER_SECONDS = 1

type HttpMethod = 'GET' | 'POST' | 'PUT' | 'DELETE'

export class SpotifyApiError extends Error {
  constructor(
    message: string,
    public readonly status: number,
    public readonly endpoint: string,
  ) {
    super(message)
    this.name = 'SpotifyApiError'
    Object.setPrototypeOf(this, new.target.prototype)

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target)
    }
  }
}

export class SpotifyApiService implements SpotifyCatalog {
  private readonly log: FastifyBaseLogger

  constructor(
    readonly baseLog: FastifyBaseLogger,
    private readonly config: SpotifyClientConfig,
  ) {
    this.log = createServiceLogger(baseLog, 'SPOTIFY')
  }

  async fetchPlaylistTracksPage(
    playlistId: string,
    cursor: string | undefined,
  ): Promise<Page<Track>> {
    const page = await this.request(
      'GET',
      cursor ??
        this.path(resourcePath('playlists', playlistId, '/tracks'), {
          limit: limitFor('playlist-items-page'),
          market: this.config.market,
        }),
      SpotifyPlaylistTracksPageSchema,
    )
    return {
      items: page.items.flatMap((item) =>
        item.track ? [toTrack(item.track)] : [],
      ),
      next: page.next,
    }
  }

  async fetchAlbumTracksPage(
    albumId: string,
    cursor: string | undefined,
  ): Promise<Page<Track>> {
    const page = await this.request(
      'GET',
      cursor ??
        this.path(resourcePath('albums', albumId, '/tracks'), {
          limit: limitFor('album-tracks-page'),
          market: this.config.market,
        }),
      SpotifyAlbumTracksPageSchema,
    )
    return {
      items: page.items.map((track) =>
        toTrack(track, { id: toSpotifyId(albumId), name: '' }),
      ),
      next: page.next,
    }
  }

  async fetchAlbums(albumIds: string[]): Promise<CatalogAlbum[]> {
    const response = await this.request(
      'GET',
      this.path('/albums', {
        ids: albumIds.join(','),
        market: this.config.market,
      }),
      SpotifyAlbumsResponseSchema,
    )
    return response.albums.flatMap((album) =>
      album ? [toCatalogAlbum(album)] : [],
    )
  }

  async fetchTracks(trackIds: string[]): Promise<(Track | null)[]> {
    const response = await this.request(
      'GET',
      this.path('/tracks', {
        ids: trackIds.join(','),
        market: this.config.market,
      }),
      SpotifyTracksResponseSchema,
    )
    return response.tracks.map((track) => (track ? toTrack(track) : null))
  }

  containsSavedTracks(trackIds: string[]): Promise<boolean[]> {
    return this.request(
      'GET',
      this.path('/me/tracks/contains', { ids: trackIds.join(',') }),
      SpotifyContainsResponseSchema,
    )
  }

  async updatePlaylistDescription(
    playlistId: string,
    description: string,
  ): Promise<void> {
    await this.send(
      'PUT',
      this.path(resourcePath('playlists', playlistId)),
      { description },
    )
  }

  async replacePlaylistItems(
    playlistId: string,
    trackIds: string[],
  ): Promise<string> {
    const response = await this.request(
      'PUT',
      this.path(resourcePath('playlists', playlistId, '/tracks')),
      SpotifySnapshotResponseSchema,
      { uris: trackIds.map(toTrackUri) },
    )
    return response.snapshot_id
  }

  async addPlaylistItems(
    playlistId: string,
    trackIds: string[],
  ): Promise<string> {
    const response = await this.request(
      'POST',
      this.path(resourcePath('playlists', playlistId, '/tracks')),
      SpotifySnapshotResponseSchema,
      { uris: trackIds.map(toTrackUri) },
    )
    return response.snapshot_id
  }

  async removePlaylistItems(
    playlistId: string,
    trackIds: string[],
  ): Promise<string> {
    const response = await this.request(
      'DELETE',
      this.path(resourcePath('playlists', playlistId, '/tracks')),
      SpotifySnapshotResponseSchema,
      { tracks: trackIds.map((id) => ({ uri: toTrackUri(id) })) },
    )
    return response.snapshot_id
  }

  private path(
    endpoint: string,
    query: Record<string, string | number> = {},
  ): string {
    const url = new URL(`${this.config.baseUrl.replace(/\/+$/, '')}${endpoint}`)
    for (const [key, value] of Object.entries(query)) {
      if (value !== '') url.searchParams.set(key, String(value))
    }
    return url.toString()
  }

  private async request<T>(
    method: HttpMethod,
    url: string,
    schema: z.ZodType<T>,
    body?: unknown,
  ): Promise<T> {
    const response = await this.send(method, url, body)
    const parsed = schema.safeParse(await response.json())
    if (!parsed.success) {
      throw new SpotifyApiError(
        `Unexpected response shape from ${method} ${endpointOf(url)}: ${parsed.error.message}`,
        response.status,
        endpointOf(url),
      )
    }
    return parsed.data
  }

  /**
   * Sends one request, waiting out 429 responses
   */
  private async send(
    method: HttpMethod,
    url: string,
    body?: unknown,
  ): Promise<Response> {
    const endpoint = endpointOf(url)

    for (let attempt = 0; ; attempt++) {
      const response = await fetch(url, {
        method,
        headers: {
          Authorization: `Bearer ${this.config.accessToken}`,
          Accept: 'application/json',
          ...(body === undefined ? {} : { 'Content-Type': 'application/json' }),
        },
        body: body === undefined ? undefined : JSON.stringify(body),
        signal: AbortSignal.timeout(this.config.timeoutMs),
      })

      if (response.ok) {
        return response
      }

      if (response.status === 429 && attempt < this.config.maxRetries) {
        const waitSeconds = retryAfterSeconds(response.headers.get('retry-after'))
        this.log.warn(
          `Rate limited on ${method} ${endpoint}, retrying in ${waitSeconds}s (attempt ${attempt + 1}/${this.config.maxRetries})`,
        )
        await delay(waitSeconds * 1000)
        continue
      }

      throw new SpotifyApiError(
        await errorMessageOf(response, method, endpoint),
        response.status,
        endpoint,
      )
    }
  }
}

/** Callers may pass a URI or share URL where an ID is expected */
function resourcePath(collection: string, id: string, suffix = ''): string {
  return `/${collection}/${encodeURIComponent(toSpotifyId(id))}${suffix}`
}

function endpointOf(url: string): string {
  return new URL(url).pathname
}

export function retryAfterSeconds(header: string | null): number {
  const seconds = Number(header)
  return header !== null && Number.isFinite(seconds) && seconds >= 0
    ? seconds
    : DEFAULT_RETRY_AFTER_SECONDS
}

async function errorMessageOf(
  response: Response,
  method: HttpMethod,
  endpoint: string,
): Promise<string> {
  const fallback = `Spotify API error: ${response.status} ${response.statusText} on ${method} ${endpoint}`
  const text = await response.text()
  if (!text) return fallback

  let json: unknown
  try {
    json = JSON.parse(text)
  } catch {
    return `${fallback}: ${text}`
  }
  const parsed = SpotifyErrorResponseSchema.safeParse(json)
  return parsed.success ? `${fallback}: ${parsed.data.error.message}` : fallback
}
