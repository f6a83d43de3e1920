import {
  Channel,
  InputOverflowError,
  PtyIoError,
  createLogger,
  err,
  errorMessage,
  ok,
  type Result,
} from '@termbridge/shared'

const logger = createLogger({ name: 'pty:input' })

export type InputChunk = string | Buffer
export type InputSink = (data: InputChunk) => void

/**
 * Writer side of a handle: a bounded queue drained by one loop that performs
 * the actual writes, so callers never wait on the terminal.
 */
export class InputBridge {
  private readonly queue: Channel<InputChunk>
  private readonly done: Promise<void>

  constructor(
    private readonly sink: InputSink,
    private readonly limit: number,
    private readonly pid: number,
  ) {
    this.queue = new Channel<InputChunk>({ capacity: limit, sizeOf: (chunk) => Buffer.byteLength(chunk) })
    this.done = this.drain()
  }

  /** Resolves once the queue is closed and drained, or a write failed. */
  get drained(): Promise<void> {
    return this.done
  }

  get pendingBytes(): number {
    return this.queue.size
  }

  push(data: InputChunk): Result<void, InputOverflowError | PtyIoError> {
    if (this.queue.isClosed) {
      return err(new PtyIoError('write', `Input closed for process ${this.pid}`))
    }
    if (!this.queue.push(data)) {
      return err(new InputOverflowError(this.queue.size, this.limit))
    }
    return ok(undefined)
  }

  close(): void {
    this.queue.close()
  }

  private async drain(): Promise<void> {
    for await (const chunk of this.queue) {
      try {
        this.sink(chunk)
      } catch (e) {
        logger.warn({ pid: this.pid, err: errorMessage(e) }, 'PTY write failed, closing input')
        this.queue.close()
        return
      }
    }
  }
}
