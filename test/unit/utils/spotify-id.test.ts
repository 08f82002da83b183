import { sameSpotifyId, toSpotifyId } from '@utils/spotify-id.js'
import { describe, expect, it } from 'vitest'

describe('spotify-id', () => {
  describe('toSpotifyId', () => {
    it('should strip a URI down to its ID', () => {
      expect(toSpotifyId('spotify:playlist:37i9dQZEVXbx')).toBe('37i9dQZEVXbx')
    })

    it('should strip a share URL and its query string', () => {
      expect(
        toSpotifyId('https://open.spotify.com/artist/4Z8W4fKeB5?si=abc'),
      ).toBe('4Z8W4fKeB5')
    })

    it('should trim bare IDs', () => {
      expect(toSpotifyId('  abc123 ')).toBe('abc123')
    })

    it('should leave unrecognized values as they are', () => {
      expect(toSpotifyId('spotify:local:a:b:c:1')).toBe('spotify:local:a:b:c:1')
    })
  })

  describe('sameSpotifyId', () => {
    it('should compare a URI against a bare ID', () => {
      expect(sameSpotifyId('spotify:playlist:stock', 'stock')).toBe(true)
      expect(sameSpotifyId('spotify:playlist:stock', 'target')).toBe(false)
    })
  })
})
