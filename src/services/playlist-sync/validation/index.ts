export { assertSafeRequest, isStockCollection } from './safety-checker.js'
