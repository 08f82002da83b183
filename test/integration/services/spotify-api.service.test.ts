import {
  retryAfterSeconds,
  SpotifyApiError,
  SpotifyApiService,
} from '@services/spotify-api.service.js'
import { HttpResponse, http } from 'msw'
import { describe, expect, it } from 'vitest'
import { createMockLogger } from '../../mocks/logger.js'
import {
  SPOTIFY_TEST_BASE_URL,
  spotifyTrackJson,
} from '../../mocks/spotify-api-handlers.js'
import { server } from '../../setup/msw-setup.js'

function createClient(maxRetries = 1) {
  return new SpotifyApiService(createMockLogger(), {
    accessToken: 'test-secret',
    baseUrl: SPOTIFY_TEST_BASE_URL,
    market: 'US',
    timeoutMs: 5000,
    maxRetries,
  })
}

describe('SpotifyApiService Integration', () => {
  describe('fetchPlaylistTracksPage', () => {
    it('should request the first page with limit, market and bearer token', async () => {
      let seenUrl = ''
      let seenAuth: string | null = null
      server.use(
        http.get(
          `${SPOTIFY_TEST_BASE_URL}/playlists/:playlistId/tracks`,
          ({ request }) => {
            seenUrl = request.url
            seenAuth = request.headers.get('authorization')
            return HttpResponse.json({
              items: [{ track: spotifyTrackJson('t1') }],
              next: `${SPOTIFY_TEST_BASE_URL}/playlists/p1/tracks?offset=50&limit=50`,
            })
          },
        ),
      )

      const page = await createClient().fetchPlaylistTracksPage('p1', undefined)

      expect(seenUrl).toBe(
        `${SPOTIFY_TEST_BASE_URL}/playlists/p1/tracks?limit=50&market=US`,
      )
      expect(seenAuth).toBe('Bearer test-secret')
      expect(page.next).toBe(
        `${SPOTIFY_TEST_BASE_URL}/playlists/p1/tracks?offset=50&limit=50`,
      )
      expect(page.items).toEqual([
        {
          id: 't1',
          name: 'Track t1',
          durationMs: 180_000,
          catalogCode: 'ISRCT1',
          artists: [{ id: 'artist-1', name: 'Test Artist' }],
          album: { id: 'album-1', name: 'Test Album' },
          isLocal: false,
          linkedFromId: null,
        },
      ])
    })

    it('should follow the next URL as the cursor', async () => {
      let seenUrl = ''
      server.use(
        http.get(
          `${SPOTIFY_TEST_BASE_URL}/playlists/:playlistId/tracks`,
          ({ request }) => {
            seenUrl = request.url
            return HttpResponse.json({ items: [], next: null })
          },
        ),
      )
      const cursor = `${SPOTIFY_TEST_BASE_URL}/playlists/p1/tracks?offset=50&limit=50`

      const page = await createClient().fetchPlaylistTracksPage('p1', cursor)

      expect(seenUrl).toBe(cursor)
      expect(page).toEqual({ items: [], next: null })
    })

    it('should accept a playlist URI in place of the ID', async () => {
      let seenUrl = ''
      server.use(
        http.get(
          `${SPOTIFY_TEST_BASE_URL}/playlists/:playlistId/tracks`,
          ({ request }) => {
            seenUrl = request.url
            return HttpResponse.json({ items: [], next: null })
          },
        ),
      )

      await createClient().fetchPlaylistTracksPage(
        'spotify:playlist:p1',
        undefined,
      )

      expect(seenUrl).toBe(
        `${SPOTIFY_TEST_BASE_URL}/playlists/p1/tracks?limit=50&market=US`,
      )
    })

    it('should skip episodes and unavailable items', async () => {
      server.use(
        http.get(`${SPOTIFY_TEST_BASE_URL}/playlists/:playlistId/tracks`, () =>
          HttpResponse.json({
            items: [
              { track: null },
              { track: { type: 'episode', id: 'e1', name: 'Episode' } },
              { track: spotifyTrackJson('t2') },
            ],
            next: null,
          }),
        ),
      )

      const page = await createClient().fetchPlaylistTracksPage('p1', undefined)

      expect(page.items.map((track) => track.id)).toEqual(['t2'])
    })

    it('should identify local files by URI', async () => {
      server.use(
        http.get(`${SPOTIFY_TEST_BASE_URL}/playlists/:playlistId/tracks`, () =>
          HttpResponse.json({
            items: [
              {
                track: spotifyTrackJson('ignored', {
                  id: null,
                  uri: 'spotify:local:Artist:Album:Song:200',
                  is_local: true,
                  album: { id: null, name: 'Album' },
                }),
              },
            ],
            next: null,
          }),
        ),
      )

      const page = await createClient().fetchPlaylistTracksPage('p1', undefined)

      expect(page.items[0]).toMatchObject({
        id: 'spotify:local:Artist:Album:Song:200',
        isLocal: true,
        album: { id: null, name: 'Album' },
      })
    })

    it('should keep the stored ID of a relinked track', async () => {
      server.use(
        http.get(`${SPOTIFY_TEST_BASE_URL}/playlists/:playlistId/tracks`, () =>
          HttpResponse.json({
            items: [
              {
                track: spotifyTrackJson('playable', {
                  linked_from: { id: 'stored' },
                }),
              },
            ],
            next: null,
          }),
        ),
      )

      const page = await createClient().fetchPlaylistTracksPage('p1', undefined)

      expect(page.items[0]).toMatchObject({
        id: 'playable',
        linkedFromId: 'stored',
      })
    })
  })

  describe('fetchAlbums', () => {
    it('should map embedded track pages and drop unknown albums', async () => {
      let ids: string | null = null
      server.use(
        http.get(`${SPOTIFY_TEST_BASE_URL}/albums`, ({ request }) => {
          ids = new URL(request.url).searchParams.get('ids')
          return HttpResponse.json({
            albums: [
              {
                id: 'a1',
                name: 'First Album',
                tracks: {
                  items: [
                    {
                      id: 's1',
                      uri: 'spotify:track:s1',
                      name: 'Song',
                      duration_ms: 1000,
                      artists: [{ id: 'ar1', name: 'Artist' }],
                    },
                  ],
                  next: `${SPOTIFY_TEST_BASE_URL}/albums/a1/tracks?offset=50`,
                },
              },
              null,
            ],
          })
        }),
      )

      const albums = await createClient().fetchAlbums(['a1', 'missing'])

      expect(ids).toBe('a1,missing')
      expect(albums).toEqual([
        {
          id: 'a1',
          name: 'First Album',
          tracks: {
            items: [
              {
                id: 's1',
                name: 'Song',
                durationMs: 1000,
                catalogCode: null,
                artists: [{ id: 'ar1', name: 'Artist' }],
                album: { id: 'a1', name: 'First Album' },
                isLocal: false,
                linkedFromId: null,
              },
            ],
            next: `${SPOTIFY_TEST_BASE_URL}/albums/a1/tracks?offset=50`,
          },
        },
      ])
    })
  })

  describe('fetchTracks', () => {
    it('should keep positions of unknown tracks as null', async () => {
      server.use(
        http.get(`${SPOTIFY_TEST_BASE_URL}/tracks`, () =>
          HttpResponse.json({ tracks: [spotifyTrackJson('t1'), null] }),
        ),
      )

      const tracks = await createClient().fetchTracks(['t1', 'gone'])

      expect(tracks.map((track) => track?.id ?? null)).toEqual(['t1', null])
    })
  })

  describe('containsSavedTracks', () => {
    it('should return one flag per ID', async () => {
      server.use(
        http.get(`${SPOTIFY_TEST_BASE_URL}/me/tracks/contains`, () =>
          HttpResponse.json([true, false]),
        ),
      )

      await expect(
        createClient().containsSavedTracks(['t1', 't2']),
      ).resolves.toEqual([true, false])
    })
  })

  describe('writes', () => {
    it('should replace, append and remove items by URI', async () => {
      const bodies: Array<[string, unknown]> = []
      const record = async ({ request }: { request: Request }) => {
        bodies.push([request.method, await request.json()])
        return HttpResponse.json({ snapshot_id: `snap-${bodies.length}` })
      }
      server.use(
        http.put(`${SPOTIFY_TEST_BASE_URL}/playlists/:playlistId/tracks`, record),
        http.post(`${SPOTIFY_TEST_BASE_URL}/playlists/:playlistId/tracks`, record),
        http.delete(`${SPOTIFY_TEST_BASE_URL}/playlists/:playlistId/tracks`, record),
      )
      const client = createClient()

      await expect(client.replacePlaylistItems('p1', ['t1'])).resolves.toBe(
        'snap-1',
      )
      await client.addPlaylistItems('p1', ['t2'])
      await client.removePlaylistItems('p1', ['t3'])

      expect(bodies).toEqual([
        ['PUT', { uris: ['spotify:track:t1'] }],
        ['POST', { uris: ['spotify:track:t2'] }],
        ['DELETE', { tracks: [{ uri: 'spotify:track:t3' }] }],
      ])
    })

    it('should write to the playlist named by a share URL', async () => {
      const paths: string[] = []
      const record = ({ request }: { request: Request }) => {
        paths.push(`${request.method} ${new URL(request.url).pathname}`)
        return HttpResponse.json({ snapshot_id: 'snap' })
      }
      server.use(
        http.put(`${SPOTIFY_TEST_BASE_URL}/playlists/:playlistId/tracks`, record),
        http.delete(`${SPOTIFY_TEST_BASE_URL}/playlists/:playlistId/tracks`, record),
      )
      const client = createClient()
      const shareUrl = 'https://open.spotify.com/playlist/p1?si=abc'

      await client.replacePlaylistItems(shareUrl, ['t1'])
      await client.removePlaylistItems(shareUrl, ['t1'])

      expect(paths).toEqual([
        'PUT /v1/playlists/p1/tracks',
        'DELETE /v1/playlists/p1/tracks',
      ])
    })

    it('should update the playlist description', async () => {
      let body: unknown
      server.use(
        http.put(
          `${SPOTIFY_TEST_BASE_URL}/playlists/:playlistId`,
          async ({ request }) => {
            body = await request.json()
            return new HttpResponse(null, { status: 200 })
          },
        ),
      )

      await createClient().updatePlaylistDescription('p1', 'Updated on 01/15/2024.')

      expect(body).toEqual({ description: 'Updated on 01/15/2024.' })
    })
  })

  describe('errors', () => {
    it('should retry after a 429 and succeed', async () => {
      let attempts = 0
      server.use(
        http.get(`${SPOTIFY_TEST_BASE_URL}/tracks`, () => {
          attempts++
          return attempts === 1
            ? new HttpResponse(null, {
                status: 429,
                headers: { 'Retry-After': '0' },
              })
            : HttpResponse.json({ tracks: [spotifyTrackJson('t1')] })
        }),
      )

      const tracks = await createClient(1).fetchTracks(['t1'])

      expect(attempts).toBe(2)
      expect(tracks).toHaveLength(1)
    })

    it('should give up once retries are exhausted', async () => {
      server.use(
        http.get(
          `${SPOTIFY_TEST_BASE_URL}/tracks`,
          () =>
            new HttpResponse(null, {
              status: 429,
              statusText: 'Too Many Requests',
              headers: { 'Retry-After': '0' },
            }),
        ),
      )

      await expect(createClient(0).fetchTracks(['t1'])).rejects.toMatchObject({
        name: 'SpotifyApiError',
        status: 429,
        endpoint: '/v1/tracks',
      })
    })

    it('should include the API error message', async () => {
      server.use(
        http.get(`${SPOTIFY_TEST_BASE_URL}/albums`, () =>
          HttpResponse.json(
            { error: { status: 401, message: 'The access token expired' } },
            { status: 401, statusText: 'Unauthorized' },
          ),
        ),
      )

      const error = await createClient()
        .fetchAlbums(['a1'])
        .catch((err: unknown) => err)

      expect(error).toBeInstanceOf(SpotifyApiError)
      expect(error).toMatchObject({
        message:
          'Spotify API error: 401 Unauthorized on GET /v1/albums: The access token expired',
        status: 401,
      })
    })

    it('should reject a response of the wrong shape', async () => {
      server.use(
        http.get(`${SPOTIFY_TEST_BASE_URL}/me/tracks/contains`, () =>
          HttpResponse.json({ saved: true }),
        ),
      )

      await expect(
        createClient().containsSavedTracks(['t1']),
      ).rejects.toThrow(
        /^Unexpected response shape from GET \/v1\/me\/tracks\/contains/,
      )
    })
  })

  describe('retryAfterSeconds', () => {
    it('should read the header in seconds', () => {
      expect(retryAfterSeconds('3')).toBe(3)
    })

    it('should fall back to one second for a missing or bad header', () => {
      expect(retryAfterSeconds(null)).toBe(1)
      expect(retryAfterSeconds('soon')).toBe(1)
    })
  })
})
