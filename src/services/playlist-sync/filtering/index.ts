export type {
  BlacklistEntry,
  BlacklistResult,
  BlacklistStore,
} from './blacklist-filter.js'
export {
  applyBlacklist,
  ConfigBlacklistStore,
  normalizeArtistName,
} from './blacklist-filter.js'
