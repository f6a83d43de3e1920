import headless, { type Terminal as HeadlessTerminalType } from '@xterm/headless'
import type { PtySize } from './types.js'

const { Terminal: HeadlessTerminal } = headless

export interface TerminalSnapshot {
  cols: number
  rows: number
  cursorX: number
  cursorY: number
}

/**
 * Local mirror of the screen for the pipe driver, which has no real terminal
 * to ask. Used for diagnostics only; output reaches the client untouched.
 */
export class TerminalStateTracker {
  private readonly term: HeadlessTerminalType
  private disposed = false

  constructor(size: PtySize, scrollback = 1000) {
    this.term = new HeadlessTerminal({ cols: size.cols, rows: size.rows, scrollback, allowProposedApi: true })
  }

  process(data: Uint8Array): void {
    if (this.disposed) return
    this.term.write(data)
  }

  resize(size: PtySize): void {
    if (this.disposed) return
    this.term.resize(size.cols, size.rows)
  }

  /** Resolves once every earlier `process` call has been parsed. */
  flush(): Promise<void> {
    if (this.disposed) return Promise.resolve()
    return new Promise((resolve) => this.term.write('', resolve))
  }

  snapshot(): TerminalSnapshot {
    const active = this.term.buffer.active
    return {
      cols: this.term.cols,
      rows: this.term.rows,
      cursorX: active.cursorX,
      cursorY: active.cursorY,
    }
  }

  dispose(): void {
    if (this.disposed) return
    this.disposed = true
    this.term.dispose()
  }
}
