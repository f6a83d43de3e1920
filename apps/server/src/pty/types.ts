import type { Channel, InputOverflowError, PtyIoError, Result } from '@termbridge/shared'

export interface PtySize {
  cols: number
  rows: number
}

export const DEFAULT_PTY_SIZE: Readonly<PtySize> = { cols: 80, rows: 24 }

// Output chunks handed to the session never exceed this.
export const MAX_OUTPUT_CHUNK = 8192

export interface PtySpawnOptions {
  // argv; the first entry is the executable
  command: string[]
  size: PtySize
  cwd?: string | undefined
  // Bound on queued, not yet written input.
  maxPendingInputBytes: number
}

export interface PtyExit {
  exitCode: number | null
  signal: number | string | null
}

/**
 * One child process attached to a terminal. Owned by exactly one session.
 * `output` closes after the process exits and its remaining output has been
 * queued.
 */
export interface PtyHandle {
  readonly pid: number
  readonly output: Channel<Buffer>
  readonly exited: Promise<PtyExit>
  write(data: string | Buffer): Result<void, InputOverflowError | PtyIoError>
  resize(size: PtySize): Result<void, PtyIoError>
  // Idempotent. A process that already exited is not signalled again.
  kill(): Result<void, PtyIoError>
}

export type PtyDriverName = 'pty' | 'pipe'

export interface PtyDriver {
  readonly name: PtyDriverName
  // Rejects with SpawnError; no handle exists on failure.
  spawn(options: PtySpawnOptions): Promise<PtyHandle>
}

export function chunkOutput(data: Buffer, max = MAX_OUTPUT_CHUNK): Buffer[] {
  if (data.length <= max) return [data]
  const chunks: Buffer[] = []
  for (let offset = 0; offset < data.length; offset += max) {
    chunks.push(data.subarray(offset, offset + max))
  }
  return chunks
}

export function normalizeSize(cols: number, rows: number): PtySize {
  return {
    cols: cols > 0 ? cols : DEFAULT_PTY_SIZE.cols,
    rows: rows > 0 ? rows : DEFAULT_PTY_SIZE.rows,
  }
}
