import type { IncomingHttpHeaders } from 'node:http'
import { createLogger, errorMessage, type Logger } from '@termbridge/shared'
import type { ServerConfig } from '../config/schema.js'
import type { PtyDriver } from '../pty/index.js'
import { TerminalSession, type CloseReason, type PeerConnection, type SessionSettings } from '../session/index.js'

export interface UpgradeRejection {
  status: 403 | 503
  message: string
}

export interface TerminalAcceptorOptions {
  config: ServerConfig
  driver: PtyDriver
  logger?: Logger
  // Fired when the single session of a `once` server has ended.
  onFinished?: () => void
}

export function sessionSettings(config: ServerConfig): SessionSettings {
  return {
    command: config.command,
    cwd: config.cwd,
    credential: config.credential,
    writable: config.writable,
    mouse: config.mouse,
    maxPendingInputBytes: config.maxPendingInputBytes,
    preferences: config.preferences,
  }
}

// Browsers always send Origin; clients that omit it are refused when checking.
export function originMatchesHost(headers: IncomingHttpHeaders): boolean {
  const origin = headers.origin
  const host = headers.host
  if (!origin || !host) return false
  try {
    return new URL(origin).host.toLowerCase() === host.toLowerCase()
  } catch {
    return false
  }
}

/** Admits upgrades against the server limits and runs one session per peer. */
export class TerminalAcceptor {
  private readonly config: ServerConfig
  private readonly driver: PtyDriver
  private readonly logger: Logger
  private readonly onFinished: (() => void) | undefined
  private readonly sessions = new Map<string, TerminalSession>()
  private readonly running = new Set<Promise<void>>()
  private accepted = 0
  private closing = false

  constructor(opts: TerminalAcceptorOptions) {
    this.config = opts.config
    this.driver = opts.driver
    this.logger = opts.logger ?? createLogger({ name: 'acceptor' })
    this.onFinished = opts.onFinished
  }

  get activeSessions(): number {
    return this.sessions.size
  }

  get acceptedSessions(): number {
    return this.accepted
  }

  admit(headers: IncomingHttpHeaders): UpgradeRejection | null {
    if (this.closing) {
      return { status: 503, message: 'Server is shutting down' }
    }
    if (this.config.once && this.accepted > 0) {
      return { status: 503, message: 'Server accepts a single session' }
    }
    if (this.config.maxClients > 0 && this.sessions.size >= this.config.maxClients) {
      return { status: 503, message: 'Too many clients' }
    }
    if (this.config.checkOrigin && !originMatchesHost(headers)) {
      return { status: 403, message: 'Origin not allowed' }
    }
    return null
  }

  accept(peer: PeerConnection): TerminalSession {
    this.accepted += 1
    const session = new TerminalSession({
      peer,
      driver: this.driver,
      settings: sessionSettings(this.config),
      logger: this.logger,
    })
    this.sessions.set(session.id, session)
    this.logger.info({ sessionId: session.id, active: this.sessions.size }, 'Client connected')

    const task: Promise<void> = session
      .run()
      .then(
        (reason) => this.finished(session, reason),
        (e: unknown) => {
          this.logger.error({ sessionId: session.id, err: errorMessage(e) }, 'Session failed')
          this.finished(session, null)
        },
      )
      .then(() => {
        this.running.delete(task)
      })
    this.running.add(task)
    if (this.closing) session.stop()
    return session
  }

  /** Refuses new clients, stops every session and waits for them to end. */
  async shutdown(): Promise<void> {
    this.closing = true
    for (const session of this.sessions.values()) session.stop()
    await Promise.all(this.running)
  }

  private finished(session: TerminalSession, reason: CloseReason | null): void {
    this.sessions.delete(session.id)
    this.logger.info({ sessionId: session.id, reason, active: this.sessions.size }, 'Client disconnected')
    if (this.config.once) this.onFinished?.()
  }
}
