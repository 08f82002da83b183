const URI_PATTERN = /^spotify:[a-z]+:([^:]+)$/i
const URL_PATTERN = /^https?:\/\/open\.spotify\.com\/[a-z]+\/([^/?#]+)/i

/**
 * Reduces a Spotify URI (`spotify:artist:abc`) or share URL
 * (`https://open.spotify.com/playlist/abc?si=...`) to its bare ID.
 * Bare IDs pass through trimmed.
 */
export function toSpotifyId(value: string): string {
  const trimmed = value.trim()
  const match = URI_PATTERN.exec(trimmed) ?? URL_PATTERN.exec(trimmed)
  return match?.[1] ?? trimmed
}

export function sameSpotifyId(a: string, b: string): boolean {
  return toSpotifyId(a) === toSpotifyId(b)
}
