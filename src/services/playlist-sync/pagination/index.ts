export type { PaginateOptions } from './paginator.js'
export { collectAll, PaginationError, paginate } from './paginator.js'
