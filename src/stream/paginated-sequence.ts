import { validatePageSize } from "../schema/page-size.js"
import type {
  CursorSnapshot,
  PageLoader,
  PaginatedSequenceOptions,
  PullResult,
  SequenceState,
  VerboseLog,
} from "./types.js"

const LOG_SCOPE = "page-stream"

/**
 * Lazy, forward-only stream over a paged source.
 *
 * Holds at most one page in memory. Each pull either hands out the next buffered item
 * or, once the buffer is drained, asks the loader for the page at `offset`. An empty
 * page ends the sequence for good. A loader failure reaches the caller untouched and
 * also ends the sequence: the offset stays where it was, later pulls reject with the
 * same error and never reach the loader. Recovering means building a new sequence.
 *
 * Await each pull before starting the next one. Overlapping pulls while a page is
 * loading read the same cursor, so both fetch the same offset and emit the same item.
 */
export class PaginatedSequence<TSource, TItem> implements AsyncIterator<TItem, undefined>, AsyncIterable<TItem> {
  private readonly pageSize: number
  private readonly log: VerboseLog | undefined
  private buffer: readonly TItem[] = []
  private position = 0
  private offset = 0
  private currentState: SequenceState = "draining"
  private failure: unknown

  constructor(
    private readonly source: TSource,
    private readonly loader: PageLoader<TSource, TItem>,
    pageSize: number,
    options: PaginatedSequenceOptions = {},
  ) {
    this.pageSize = validatePageSize(pageSize)
    this.log = options.verbose
  }

  get state(): SequenceState {
    return this.currentState
  }

  get cursor(): CursorSnapshot {
    return {
      offset: this.offset,
      pageSize: this.pageSize,
      buffered: this.buffer.length - this.position,
    }
  }

  pull(): Promise<PullResult<TItem>> {
    if (this.currentState === "failed") {
      return Promise.reject(this.failure)
    }
    if (this.currentState === "exhausted") {
      return Promise.resolve<PullResult<TItem>>({ done: true })
    }
    if (this.position < this.buffer.length) {
      const value = this.buffer[this.position]
      this.position += 1
      return Promise.resolve<PullResult<TItem>>({ done: false, value })
    }
    return this.loadPage()
  }

  async next(): Promise<IteratorResult<TItem, undefined>> {
    const result = await this.pull()
    if (result.done) {
      return { done: true, value: undefined }
    }
    return { done: false, value: result.value }
  }

  /** Called when iteration stops early. Nothing is held open, so there is nothing to release. */
  return(): Promise<IteratorResult<TItem, undefined>> {
    return Promise.resolve<IteratorResult<TItem, undefined>>({ done: true, value: undefined })
  }

  [Symbol.asyncIterator](): this {
    return this
  }

  async toArray(): Promise<TItem[]> {
    const items: TItem[] = []
    for (let result = await this.pull(); !result.done; result = await this.pull()) {
      items.push(result.value)
    }
    return items
  }

  private async loadPage(): Promise<PullResult<TItem>> {
    const offset = this.offset
    this.log?.(LOG_SCOPE, `loading page (offset=${offset}, limit=${this.pageSize})`)
    let page: readonly TItem[]
    try {
      page = await this.loader.load(this.source, offset, this.pageSize)
    } catch (error) {
      this.currentState = "failed"
      this.failure = error
      throw error
    }

    if (page.length === 0) {
      this.currentState = "exhausted"
      this.log?.(LOG_SCOPE, `source exhausted at offset=${offset}`)
      return { done: true }
    }

    // Stride is a full page even when the page came back short.
    this.buffer = page
    this.position = 1
    this.offset = offset + this.pageSize
    this.log?.(LOG_SCOPE, `page loaded (${page.length} items, next offset=${this.offset})`)
    return { done: false, value: page[0] }
  }
}

export const createPaginatedSequence = <TSource, TItem>(
  source: TSource,
  loader: PageLoader<TSource, TItem>,
  pageSize: number,
  options?: PaginatedSequenceOptions,
): PaginatedSequence<TSource, TItem> => new PaginatedSequence(source, loader, pageSize, options)
