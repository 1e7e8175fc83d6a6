/**
 * Lazy, restartable iteration over offset/limit endpoints
 */

import type { ApiResult } from './request.js'

import { isSuccess } from './request.js'

export interface PageData<T> {
  items: T[]
  total: number
}

export type RawPageFetcher<T> = (start: number, chunk: number) => Promise<ApiResult<PageData<T>>>

export type PagerStep<T> =
  | { done: false; items: T[]; status: number }
  | { done: true }

/**
 * Cursor over a paginated endpoint. `index` and `chunk` may be changed
 * between advances to skip or re-fetch pages.
 *
 * The service answers an out-of-range index with the first page again,
 * so the pager stops only when the retrieved count reaches the total.
 * Not safe to advance concurrently.
 */
export class Pager<T> {
  chunk: number
  exhausted = false
  index: number
  retrieved = 0
  started = false
  total = 0

  constructor(
    private readonly raw: RawPageFetcher<T>,
    private readonly start = 1,
    chunk = 10
  ) {
    this.index = start
    this.chunk = chunk
  }

  /**
   * 0 until the first page is fetched, then the total reported by the service
   */
  get length(): number {
    return this.started ? this.total : 0
  }

  async *[Symbol.asyncIterator](): AsyncGenerator<[status: number, items: T[]]> {
    while (true) {
      const step = await this.advance()
      if (step.done) return
      yield [step.status, step.items]
    }
  }

  /**
   * Fetch the next page, one request per call
   */
  async advance(): Promise<PagerStep<T>> {
    if (this.exhausted) {
      return { done: true }
    }

    const [status, page] = await this.raw(this.index, this.chunk)
    if (!isSuccess(status)) {
      this.exhausted = true
      return { done: false, items: [], status }
    }

    if (!this.started) {
      this.total = page.total
      this.started = true
    }

    this.retrieved += page.items.length
    this.index += this.chunk
    if (this.retrieved >= this.total) {
      this.exhausted = true
    }

    return { done: false, items: page.items, status }
  }

  /**
   * Rewind to a fresh cursor, optionally from another start index
   */
  reset(start = this.start): void {
    this.index = start
    this.exhausted = false
    this.retrieved = 0
    this.started = false
    this.total = 0
  }
}
