export interface ChannelOptions<T> {
  /** Upper bound on the summed `sizeOf` of queued items. Defaults to unbounded. */
  capacity?: number
  sizeOf?: (item: T) => number
}

interface Waiter<T> {
  resolve: (item: T | undefined) => void
  reject: (err: Error) => void
}

/**
 * Ordered single-producer/single-consumer queue with async receive.
 *
 * `next()` resolves with the next item, or `undefined` once the channel is
 * closed and drained. Closing with an error makes `next()` reject after the
 * queued items have been delivered.
 */
export class Channel<T extends NonNullable<unknown>> {
  private items: T[] = []
  private waiters: Waiter<T>[] = []
  private queuedSize = 0
  private closed = false
  private failure: Error | null = null
  private readonly capacity: number
  private readonly sizeOf: (item: T) => number

  constructor(opts: ChannelOptions<T> = {}) {
    this.capacity = opts.capacity ?? Number.POSITIVE_INFINITY
    this.sizeOf = opts.sizeOf ?? (() => 1)
  }

  get length(): number {
    return this.items.length
  }

  /** Summed `sizeOf` of everything still queued. */
  get size(): number {
    return this.queuedSize
  }

  get isClosed(): boolean {
    return this.closed
  }

  /** Returns false when the channel is closed or the item would exceed capacity. */
  push(item: T): boolean {
    if (this.closed) return false

    const waiter = this.waiters.shift()
    if (waiter) {
      waiter.resolve(item)
      return true
    }

    const itemSize = this.sizeOf(item)
    if (this.queuedSize + itemSize > this.capacity) return false
    this.items.push(item)
    this.queuedSize += itemSize
    return true
  }

  next(): Promise<T | undefined> {
    const item = this.items.shift()
    if (item !== undefined) {
      this.queuedSize -= this.sizeOf(item)
      return Promise.resolve(item)
    }
    if (this.failure) return Promise.reject(this.failure)
    if (this.closed) return Promise.resolve(undefined)
    return new Promise((resolve, reject) => {
      this.waiters.push({ resolve, reject })
    })
  }

  close(error?: Error): void {
    if (this.closed) return
    this.closed = true
    this.failure = error ?? null
    const waiters = this.waiters
    this.waiters = []
    for (const waiter of waiters) {
      if (error) waiter.reject(error)
      else waiter.resolve(undefined)
    }
  }

  async *[Symbol.asyncIterator](): AsyncGenerator<T, void, undefined> {
    for (;;) {
      const item = await this.next()
      if (item === undefined) return
      yield item
    }
  }
}
