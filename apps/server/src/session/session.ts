import os from 'node:os'
import {
  encodeMouseClick,
  encodeMouseDrag,
  parseClientFrame,
  serializeServerMessage,
  type InitMessage,
  type ProtocolVariant,
  type ServerMessage,
} from '@termbridge/protocol'
import {
  Channel,
  TransportError,
  assertNever,
  createLogger,
  errorMessage,
  newSessionId,
  type Logger,
} from '@termbridge/shared'
import { checkAuthToken } from '../auth/credential.js'
import { normalizeSize, type PtyDriver, type PtyHandle, type PtySize } from '../pty/index.js'
import type { PeerConnection } from './peer.js'

const baseLogger = createLogger({ name: 'session' })

export type SessionState = 'connecting' | 'awaiting-init' | 'active' | 'paused' | 'closing' | 'closed'

export type CloseReason =
  | 'peer-closed'
  | 'auth-failed'
  | 'spawn-failed'
  | 'transport-error'
  | 'process-exited'
  | 'stopped'

export interface SessionSettings {
  command: string[]
  cwd?: string | undefined
  credential?: string | undefined
  writable: boolean
  mouse: boolean
  maxPendingInputBytes: number
  preferences: Record<string, unknown>
  // Defaults to "<command> (<hostname>)"
  title?: string | undefined
}

export interface TerminalSessionOptions {
  peer: PeerConnection
  driver: PtyDriver
  settings: SessionSettings
  id?: string
  logger?: Logger
}

type OutputEvent = { kind: 'output'; chunk: Buffer | undefined }

type LoopEvent =
  | { kind: 'frame'; frame: Uint8Array | null }
  | { kind: 'frame-error'; error: TransportError }
  | OutputEvent
  | { kind: 'stop' }

export function windowTitle(command: string[], hostname = os.hostname()): string {
  return `${command.join(' ')} (${hostname})`
}

/**
 * One connection, one process. `run()` drives the session until the peer
 * leaves, a fatal error occurs or the process exits, and always kills the
 * process on the way out.
 */
export class TerminalSession {
  readonly id: string
  private readonly peer: PeerConnection
  private readonly driver: PtyDriver
  private readonly settings: SessionSettings
  private readonly logger: Logger
  private readonly variant: ProtocolVariant
  // Every source feeds this queue; each has at most one read in flight.
  private readonly events = new Channel<LoopEvent>()
  private running: Promise<CloseReason> | null = null

  private state: SessionState = 'connecting'
  private handle: PtyHandle | null = null
  private paused = false
  private authenticated: boolean
  private outputArmed = false
  // A chunk that arrived just as the client paused, delivered on resume.
  private heldOutput: OutputEvent | null = null

  constructor(opts: TerminalSessionOptions) {
    this.id = opts.id ?? newSessionId()
    this.peer = opts.peer
    this.driver = opts.driver
    this.settings = opts.settings
    this.logger = (opts.logger ?? baseLogger).child({ sessionId: this.id })
    this.variant = opts.settings.mouse ? 'mouse' : 'plain'
    this.authenticated = opts.settings.credential === undefined
  }

  get currentState(): SessionState {
    return this.state
  }

  get isPaused(): boolean {
    return this.paused
  }

  get isAuthenticated(): boolean {
    return this.authenticated
  }

  get pid(): number | null {
    return this.handle?.pid ?? null
  }

  run(): Promise<CloseReason> {
    this.running ??= this.runToCompletion()
    return this.running
  }

  /** Ask a running session to wind down; the process is killed by teardown. */
  stop(): void {
    this.events.push({ kind: 'stop' })
  }

  private async runToCompletion(): Promise<CloseReason> {
    try {
      const reason = await this.serve()
      this.logger.info({ reason }, 'Session ended')
      return reason
    } finally {
      this.teardown()
    }
  }

  private async serve(): Promise<CloseReason> {
    const title = this.settings.title ?? windowTitle(this.settings.command)
    const started =
      (await this.send({ type: 'set-window-title', title })) &&
      (await this.send({ type: 'set-preferences', preferences: JSON.stringify(this.settings.preferences) }))
    if (!started) return 'transport-error'
    this.state = 'awaiting-init'

    this.armFrame()

    for (;;) {
      const event = await this.events.next()
      if (event === undefined) return 'stopped'

      switch (event.kind) {
        case 'stop':
          return 'stopped'
        case 'frame-error':
          this.logger.error({ err: event.error.message }, 'Transport failed while receiving')
          return 'transport-error'
        case 'frame': {
          if (event.frame === null) return 'peer-closed'
          const outcome = await this.handleFrame(event.frame)
          if (outcome) return outcome
          this.armFrame()
          break
        }
        case 'output': {
          this.outputArmed = false
          if (this.currentState === 'paused') {
            this.heldOutput = event
            break
          }
          if (event.chunk === undefined) return 'process-exited'
          if (!(await this.send({ type: 'output', data: event.chunk }))) return 'transport-error'
          this.armOutput()
          break
        }
        default:
          return assertNever(event)
      }
    }
  }

  private armFrame(): void {
    void this.peer.receive().then(
      (frame) => this.events.push({ kind: 'frame', frame }),
      (e: unknown) =>
        this.events.push({
          kind: 'frame-error',
          error: e instanceof TransportError ? e : new TransportError(errorMessage(e)),
        }),
    )
  }

  private armOutput(): void {
    const handle = this.handle
    if (!handle || this.outputArmed || this.state !== 'active') return
    this.outputArmed = true
    void handle.output.next().then((chunk) => this.events.push({ kind: 'output', chunk }))
  }

  private async send(message: ServerMessage): Promise<boolean> {
    try {
      await this.peer.send(serializeServerMessage(message))
      return true
    } catch (e) {
      this.logger.error({ err: errorMessage(e), type: message.type }, 'Failed to send frame')
      return false
    }
  }

  private async handleFrame(frame: Uint8Array): Promise<CloseReason | null> {
    const parsed = parseClientFrame(frame, this.variant)
    if (!parsed.ok) {
      this.logger.warn({ err: parsed.error.message }, 'Dropping malformed frame')
      return null
    }

    const message = parsed.value
    switch (message.type) {
      case 'init':
        return this.handleInit(message)
      case 'input':
        this.writeInput(message.data)
        return null
      case 'resize':
        this.resize({ cols: message.cols, rows: message.rows })
        return null
      case 'pause':
        this.setPaused(true)
        return null
      case 'resume':
        this.setPaused(false)
        return null
      case 'mouse-click':
        this.writeInput(encodeMouseClick(message.x, message.y, message.button, message.pressed))
        return null
      case 'mouse-drag':
        this.writeInput(encodeMouseDrag(message.x, message.y, message.button))
        return null
      default:
        return assertNever(message)
    }
  }

  private async handleInit(message: InitMessage): Promise<CloseReason | null> {
    if (this.state !== 'awaiting-init') {
      this.logger.warn('Ignoring repeated init')
      return null
    }

    const auth = checkAuthToken(this.settings.credential, message.authToken)
    if (!auth.ok) {
      this.logger.warn({ err: auth.error.message }, 'Authentication failed')
      return 'auth-failed'
    }
    this.authenticated = true

    const size = normalizeSize(message.columns, message.rows)
    this.logger.info({ ...size }, 'Spawning process')
    try {
      this.handle = await this.driver.spawn({
        command: this.settings.command,
        size,
        cwd: this.settings.cwd,
        maxPendingInputBytes: this.settings.maxPendingInputBytes,
      })
    } catch (e) {
      this.logger.error({ err: errorMessage(e) }, 'Failed to spawn process')
      return 'spawn-failed'
    }

    this.logger.info({ pid: this.handle.pid, driver: this.driver.name }, 'Process attached')
    this.state = this.paused ? 'paused' : 'active'
    this.armOutput()
    return null
  }

  private writeInput(data: string | Buffer): void {
    if (!this.settings.writable) {
      this.logger.debug('Read-only session, dropping input')
      return
    }
    if (!this.handle) {
      this.logger.warn('Received input before init')
      return
    }
    const result = this.handle.write(data)
    if (!result.ok) {
      this.logger.warn({ err: result.error.message, code: result.error.code }, 'Input not written')
    }
  }

  private resize(size: PtySize): void {
    if (!this.handle) {
      this.logger.warn('Received resize before init')
      return
    }
    const result = this.handle.resize(size)
    if (!result.ok) {
      this.logger.warn({ err: result.error.message, ...size }, 'Failed to resize terminal')
    }
  }

  // Flow control before init decides the state the session starts in.
  private setPaused(paused: boolean): void {
    this.paused = paused
    if (this.state === 'active' || this.state === 'paused') {
      this.state = paused ? 'paused' : 'active'
    }
    if (!paused) {
      const held = this.heldOutput
      this.heldOutput = null
      if (held) this.events.push(held)
      else this.armOutput()
    }
    this.logger.debug({ paused }, paused ? 'Output paused' : 'Output resumed')
  }

  private teardown(): void {
    this.state = 'closing'
    this.events.close()
    const handle = this.handle
    this.handle = null
    if (handle) {
      const killed = handle.kill()
      if (killed.ok) this.logger.info({ pid: handle.pid }, 'Killed process')
      else this.logger.warn({ pid: handle.pid, err: killed.error.message }, 'Failed to kill process')
    }
    this.peer.close()
    this.state = 'closed'
  }
}
