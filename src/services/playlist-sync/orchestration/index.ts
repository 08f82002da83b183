export type {
  AlbumExpansionDeps,
  AlbumExpansionResult,
} from './album-expansion.js'
export { expandAlbums, uniqueAlbumIds } from './album-expansion.js'
export type { ChunkWriterDeps } from './chunk-writer.js'
export {
  DESCRIPTION_DATE_TOKEN,
  planWrite,
  renderDescription,
  writeChunks,
} from './chunk-writer.js'
export type { CollectionReaderDeps } from './collection-reader.js'
export { readCollection } from './collection-reader.js'
export type {
  SavedTrackFilterDeps,
  SavedTrackFilterResult,
} from './saved-track-filter.js'
export { removeSavedTracks } from './saved-track-filter.js'
export type { SourceWipeDeps } from './source-wipe.js'
export { wipeCollection } from './source-wipe.js'
