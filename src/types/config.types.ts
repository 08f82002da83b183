export type LogLevel =
  | 'fatal'
  | 'error'
  | 'warn'
  | 'info'
  | 'debug'
  | 'trace'
  | 'silent'

export type LogDestination = 'terminal' | 'file' | 'both'

export interface Config {
  // System Config
  baseUrl: string
  port: number
  logLevel: LogLevel
  logDestination: LogDestination
  closeGraceDelay: number
  // Spotify Config
  spotifyAccessToken: string
  spotifyApiBaseUrl: string
  spotifyMarket: string
  spotifyRequestTimeoutMs: number
  spotifyMaxRetries: number
  // Playlist Sync Config
  referencePlaylistId: string
  targetPlaylistId: string
  stockPlaylistId: string
  allowDuplicates: boolean
  wipeReference: boolean
  removeSavedTracks: boolean
  /** JSON array of `{ id?, name? }` entries */
  blacklistArtists: string
  albumReadConcurrency: number
  descriptionTemplate: string
  /** Cron expression; empty disables scheduled runs */
  syncSchedule: string
}
