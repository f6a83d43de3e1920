import { spawn, type SpawnOptions } from 'node:child_process'
import { stat } from 'node:fs/promises'
import type { Readable, Writable } from 'node:stream'
import {
  Channel,
  PtyIoError,
  SpawnError,
  createLogger,
  err,
  errorMessage,
  ok,
  type InputOverflowError,
  type Result,
} from '@termbridge/shared'
import { InputBridge, type InputChunk } from './input-bridge.js'
import { TERMINAL_ENV, childEnv } from './env.js'
import { TerminalStateTracker } from './terminal-state.js'
import {
  chunkOutput,
  type PtyDriver,
  type PtyExit,
  type PtyHandle,
  type PtySize,
  type PtySpawnOptions,
} from './types.js'

const logger = createLogger({ name: 'pty:pipe' })

const CTRL_C = 0x03
const CTRL_D = 0x04
const CR = 0x0d
const CRLF = Buffer.from('\r\n')

const PIPE_ENV = {
  ...TERMINAL_ENV,
  COLORTERM: 'truecolor',
  TERM_PROGRAM: 'termbridge',
  CLICOLOR: '1',
  CLICOLOR_FORCE: '1',
}

/** The slice of ChildProcess the pipe driver relies on. */
export interface PipeChild {
  readonly pid?: number | undefined
  readonly stdin: Writable | null
  readonly stdout: Readable | null
  readonly stderr: Readable | null
  kill(signal?: NodeJS.Signals): boolean
  once(event: 'spawn', listener: () => void): unknown
  once(event: 'error', listener: (err: Error) => void): unknown
  on(event: 'close', listener: (code: number | null, signal: NodeJS.Signals | null) => void): unknown
  on(event: 'error', listener: (err: Error) => void): unknown
}

export type SpawnProcess = (file: string, args: string[], options: SpawnOptions) => PipeChild

const spawnChild: SpawnProcess = (file, args, options) => spawn(file, args, options)

/**
 * What the client should see for a write, given that a piped child does not
 * echo: CR becomes CRLF, Ctrl-C and Ctrl-D stay silent, everything else is
 * echoed as sent.
 */
export function echoFor(chunk: InputChunk): Buffer | null {
  const bytes = typeof chunk === 'string' ? Buffer.from(chunk, 'utf-8') : chunk
  if (bytes.length === 0) return null
  if (bytes.length > 1) return bytes
  switch (bytes[0]) {
    case CTRL_C:
    case CTRL_D:
      return null
    case CR:
      return CRLF
    default:
      return bytes
  }
}

async function usableDirectory(cwd: string | undefined): Promise<string | undefined> {
  if (!cwd) return undefined
  try {
    if ((await stat(cwd)).isDirectory()) return cwd
  } catch (e) {
    logger.warn({ cwd, err: errorMessage(e) }, 'Working directory not accessible, ignoring')
    return undefined
  }
  logger.warn({ cwd }, 'Working directory is not a directory, ignoring')
  return undefined
}

class PipeHandle implements PtyHandle {
  readonly output = new Channel<Buffer>()
  readonly exited: Promise<PtyExit>
  readonly tracker: TerminalStateTracker
  private readonly input: InputBridge
  private hasExited = false
  private killed = false

  constructor(
    private readonly child: PipeChild,
    readonly pid: number,
    streams: { stdin: Writable; stdout: Readable; stderr: Readable },
    size: PtySize,
    maxPendingInputBytes: number,
  ) {
    this.tracker = new TerminalStateTracker(size)

    streams.stdin.on('error', (e: Error) => {
      logger.warn({ pid, err: e.message }, 'stdin error')
    })
    this.input = new InputBridge(
      (chunk) => {
        streams.stdin.write(chunk)
        const echo = echoFor(chunk)
        if (echo) this.output.push(echo)
      },
      maxPendingInputBytes,
      pid,
    )

    const forward = (data: Buffer) => {
      this.tracker.process(data)
      for (const chunk of chunkOutput(data)) this.output.push(chunk)
    }
    streams.stdout.on('data', forward)
    streams.stderr.on('data', forward)

    child.on('error', (e) => {
      logger.warn({ pid, err: e.message }, 'Child process error')
    })

    this.exited = new Promise((resolve) => {
      child.on('close', (code, signal) => {
        this.hasExited = true
        this.input.close()
        this.output.close()
        this.tracker.dispose()
        logger.info({ pid, exitCode: code, signal }, 'Piped process exited')
        resolve({ exitCode: code, signal })
      })
    })
  }

  write(data: InputChunk): Result<void, InputOverflowError | PtyIoError> {
    return this.input.push(data)
  }

  // There is no terminal to resize; only the local screen mirror follows.
  resize(size: PtySize): Result<void, PtyIoError> {
    this.tracker.resize(size)
    logger.debug({ pid: this.pid, ...this.tracker.snapshot() }, 'Terminal state resized')
    return ok(undefined)
  }

  kill(): Result<void, PtyIoError> {
    if (this.killed || this.hasExited) return ok(undefined)
    this.killed = true
    this.input.close()
    if (!this.child.kill()) {
      return err(new PtyIoError('kill', `Could not signal process ${this.pid}`))
    }
    return ok(undefined)
  }
}

/** Plain pipes plus a local terminal mirror, for hosts where node-pty is unavailable. */
export function createPipeDriver(spawnProcess: SpawnProcess = spawnChild): PtyDriver {
  return {
    name: 'pipe',
    async spawn(options: PtySpawnOptions): Promise<PtyHandle> {
      const [file, ...args] = options.command
      if (!file) throw new SpawnError('No command to spawn')

      const cwd = await usableDirectory(options.cwd)
      let child: PipeChild
      try {
        child = spawnProcess(file, args, {
          cwd,
          env: childEnv(PIPE_ENV),
          stdio: 'pipe',
          windowsHide: true,
        })
        await new Promise<void>((resolve, reject) => {
          child.once('spawn', () => resolve())
          child.once('error', reject)
        })
      } catch (e) {
        throw new SpawnError(`Failed to spawn ${file}: ${errorMessage(e)}`, { command: options.command })
      }

      const { pid, stdin, stdout, stderr } = child
      if (pid === undefined || !stdin || !stdout || !stderr) {
        child.kill()
        throw new SpawnError(`Failed to spawn ${file}: stdio not available`, { command: options.command })
      }

      logger.info({ pid, command: options.command, ...options.size }, 'Piped process spawned')
      return new PipeHandle(child, pid, { stdin, stdout, stderr }, options.size, options.maxPendingInputBytes)
    },
  }
}
