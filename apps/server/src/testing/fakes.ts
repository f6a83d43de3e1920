import { vi } from 'vitest'
import {
  Channel,
  TransportError,
  ok,
  type InputOverflowError,
  type PtyIoError,
  type Result,
} from '@termbridge/shared'
import type { PtyDriver, PtyExit, PtyHandle, PtySize } from '../pty/index.js'
import type { PeerConnection } from '../session/peer.js'

export const tick = () => new Promise<void>((resolve) => setImmediate(resolve))

/** In-memory peer: frames go in through `deliver`, sent frames collect in `sent`. */
export class FakePeer implements PeerConnection {
  readonly sent: Buffer[] = []
  closed = false
  failSends = false
  private readonly inbox = new Channel<Uint8Array>()

  async send(frame: Buffer): Promise<void> {
    if (this.failSends) throw new TransportError('socket gone')
    this.sent.push(frame)
  }

  receive(): Promise<Uint8Array | null> {
    return this.inbox.next().then((frame) => frame ?? null)
  }

  close(): void {
    this.closed = true
    this.inbox.close()
  }

  deliver(frame: string | Uint8Array): void {
    this.inbox.push(typeof frame === 'string' ? Buffer.from(frame, 'utf-8') : frame)
  }

  disconnect(): void {
    this.inbox.close()
  }

  breakTransport(): void {
    this.inbox.close(new TransportError('connection reset'))
  }

  frames(): string[] {
    return this.sent.map((frame) => frame.toString('utf-8'))
  }

  outputFrames(): string[] {
    return this.frames().filter((frame) => frame.startsWith('0'))
  }
}

export class FakeHandle implements PtyHandle {
  readonly pid = 99
  readonly output = new Channel<Buffer>()
  readonly exited: Promise<PtyExit>
  readonly written: (string | Buffer)[] = []
  readonly resizes: PtySize[] = []
  writeResult: Result<void, InputOverflowError | PtyIoError> = ok(undefined)
  kill = vi.fn<() => Result<void, PtyIoError>>(() => ok(undefined))
  private markExited: (exit: PtyExit) => void = () => undefined

  constructor() {
    this.exited = new Promise((resolve) => {
      this.markExited = resolve
    })
  }

  write(data: string | Buffer): Result<void, InputOverflowError | PtyIoError> {
    this.written.push(data)
    return this.writeResult
  }

  resize(size: PtySize): Result<void, PtyIoError> {
    this.resizes.push(size)
    return ok(undefined)
  }

  emit(text: string): void {
    this.output.push(Buffer.from(text, 'utf-8'))
  }

  exit(exitCode = 0): void {
    this.output.close()
    this.markExited({ exitCode, signal: null })
  }
}

/** A driver whose every spawn hands out a fresh FakeHandle. */
export function fakeDriver() {
  const handles: FakeHandle[] = []
  const spawn = vi.fn<PtyDriver['spawn']>(async () => {
    const handle = new FakeHandle()
    handles.push(handle)
    return handle
  })
  const driver: PtyDriver = { name: 'pty', spawn }
  return { driver, spawn, handles }
}
