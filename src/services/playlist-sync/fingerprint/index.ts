export {
  buildIdentityKey,
  durationBucket,
  fingerprintOf,
  normalizeTitle,
} from './fingerprint.js'
export { classify, emptyCollection, insert } from './collection.js'
export { missingFrom } from './differ.js'
