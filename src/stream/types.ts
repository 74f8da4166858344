export type VerboseLog = (scope: string, message: string) => void

/**
 * Fetches one page of items for a source.
 *
 * Must return an empty list exactly when nothing is left at or beyond `offset`.
 * `offset` advances by a full `limit` after every non-empty page, even a short one,
 * so implementations treat it as a page-sized stride rather than an item count.
 */
export interface PageLoader<TSource, TItem> {
  load(source: TSource, offset: number, limit: number): readonly TItem[] | Promise<readonly TItem[]>
}

export type SequenceState = "draining" | "exhausted" | "failed"

export type PullResult<TItem> = { done: false; value: TItem } | { done: true }

export interface CursorSnapshot {
  /** Offset passed to the next loader call. */
  offset: number
  pageSize: number
  /** Items fetched but not yet emitted. */
  buffered: number
}

export interface PaginatedSequenceOptions {
  verbose?: VerboseLog
}
