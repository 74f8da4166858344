export { createPaginatedSequence, PaginatedSequence } from "./stream/paginated-sequence.js"
export type {
  CursorSnapshot,
  PageLoader,
  PaginatedSequenceOptions,
  PullResult,
  SequenceState,
  VerboseLog,
} from "./stream/types.js"
export { DEFAULT_BULK_PAGE_SIZE, readStreamConfig, type StreamConfig } from "./config.js"
export { InvalidConfigurationError, isPageStreamError, PageStreamError, type PageStreamErrorCode } from "./errors.js"
export { pageSizeSchema, validatePageSize } from "./schema/page-size.js"
