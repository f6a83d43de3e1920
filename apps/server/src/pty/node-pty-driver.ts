import { chmodSync, existsSync } from 'node:fs'
import { stat } from 'node:fs/promises'
import { createRequire } from 'node:module'
import { dirname } from 'node:path'
import {
  Channel,
  PtyIoError,
  SpawnError,
  createLogger,
  err,
  errorMessage,
  ok,
  trySync,
  type InputOverflowError,
  type Result,
} from '@termbridge/shared'
import { InputBridge } from './input-bridge.js'
import { TERMINAL_ENV, childEnv } from './env.js'
import {
  chunkOutput,
  type PtyDriver,
  type PtyExit,
  type PtyHandle,
  type PtySize,
  type PtySpawnOptions,
} from './types.js'

const logger = createLogger({ name: 'pty:node-pty' })

export interface NodePtyOptions {
  name: string
  cols: number
  rows: number
  cwd: string
  env: Record<string, string>
  // null hands output over as raw Buffers
  encoding: null
}

/** The subset of node-pty's IPty this driver uses. */
export interface NodePtyProcess {
  readonly pid: number
  onData(listener: (data: string | Buffer) => void): unknown
  onExit(listener: (e: { exitCode: number; signal?: number }) => void): unknown
  write(data: string | Buffer): void
  resize(columns: number, rows: number): void
  kill(signal?: string): void
}

export interface NodePtyModule {
  spawn(file: string, args: string[], options: NodePtyOptions): NodePtyProcess
}

// Ensure node-pty's spawn-helper binary is executable.
// Some installs leave prebuilt binaries without the executable bit set,
// causing posix_spawnp to fail at runtime.
export function ensureSpawnHelperExecutable(): void {
  if (process.platform === 'win32') return
  try {
    const require = createRequire(import.meta.url)
    const ptyDir = dirname(require.resolve('node-pty/package.json'))
    const candidates = [
      `${ptyDir}/build/Release/spawn-helper`,
      `${ptyDir}/prebuilds/${process.platform}-${process.arch}/spawn-helper`,
    ]
    for (const candidate of candidates) {
      if (existsSync(candidate)) {
        chmodSync(candidate, 0o755)
        logger.debug({ path: candidate }, 'Ensured spawn-helper is executable')
      }
    }
  } catch (e) {
    // Best-effort: if this fails the spawn will surface its own error.
    logger.warn({ err: errorMessage(e) }, 'Could not ensure spawn-helper executable bit')
  }
}

async function assertDirectory(cwd: string): Promise<void> {
  let isDirectory = false
  try {
    isDirectory = (await stat(cwd)).isDirectory()
  } catch (e) {
    throw new SpawnError(`Working directory ${cwd} is not accessible`, errorMessage(e))
  }
  if (!isDirectory) throw new SpawnError(`Working directory ${cwd} is not a directory`)
}

class NodePtyHandle implements PtyHandle {
  readonly output = new Channel<Buffer>()
  readonly exited: Promise<PtyExit>
  private readonly input: InputBridge
  private hasExited = false
  private killed = false

  constructor(
    private readonly proc: NodePtyProcess,
    maxPendingInputBytes: number,
  ) {
    this.input = new InputBridge((chunk) => proc.write(chunk), maxPendingInputBytes, proc.pid)

    proc.onData((data) => {
      const bytes = typeof data === 'string' ? Buffer.from(data, 'utf-8') : data
      for (const chunk of chunkOutput(bytes)) {
        this.output.push(chunk)
      }
    })

    this.exited = new Promise((resolve) => {
      proc.onExit(({ exitCode, signal }) => {
        this.hasExited = true
        this.input.close()
        this.output.close()
        logger.info({ pid: proc.pid, exitCode, signal }, 'PTY process exited')
        resolve({ exitCode, signal: signal ?? null })
      })
    })
  }

  get pid(): number {
    return this.proc.pid
  }

  write(data: string | Buffer): Result<void, InputOverflowError | PtyIoError> {
    return this.input.push(data)
  }

  resize(size: PtySize): Result<void, PtyIoError> {
    if (this.hasExited) return ok(undefined)
    const result = trySync(() => this.proc.resize(size.cols, size.rows))
    if (!result.ok) return err(new PtyIoError('resize', result.error.message))
    return ok(undefined)
  }

  kill(): Result<void, PtyIoError> {
    if (this.killed || this.hasExited) return ok(undefined)
    this.killed = true
    this.input.close()
    // node-pty rejects signal names on Windows, where kill always terminates.
    const result = trySync(() => (process.platform === 'win32' ? this.proc.kill() : this.proc.kill('SIGTERM')))
    if (!result.ok) return err(new PtyIoError('kill', result.error.message))
    return ok(undefined)
  }
}

/** forkpty on POSIX, ConPTY on Windows. */
export function createNodePtyDriver(pty: NodePtyModule): PtyDriver {
  return {
    name: 'pty',
    async spawn(options: PtySpawnOptions): Promise<PtyHandle> {
      const [file, ...args] = options.command
      if (!file) throw new SpawnError('No command to spawn')
      if (options.cwd) await assertDirectory(options.cwd)

      let proc: NodePtyProcess
      try {
        proc = pty.spawn(file, args, {
          name: TERMINAL_ENV.TERM,
          cols: options.size.cols,
          rows: options.size.rows,
          cwd: options.cwd ?? process.cwd(),
          env: childEnv(TERMINAL_ENV),
          encoding: null,
        })
      } catch (e) {
        throw new SpawnError(`Failed to spawn ${file}: ${errorMessage(e)}`, { command: options.command })
      }

      logger.info({ pid: proc.pid, command: options.command, ...options.size }, 'PTY spawned')
      return new NodePtyHandle(proc, options.maxPendingInputBytes)
    },
  }
}
