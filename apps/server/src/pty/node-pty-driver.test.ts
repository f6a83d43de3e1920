import os from 'node:os'
import { describe, expect, it, vi } from 'vitest'
import { encodeMouseClick } from '@termbridge/protocol'
import { SpawnError } from '@termbridge/shared'
import { createNodePtyDriver, type NodePtyModule, type NodePtyOptions, type NodePtyProcess } from './node-pty-driver.js'
import type { PtySpawnOptions } from './types.js'

const tick = () => new Promise<void>((resolve) => setImmediate(resolve))

class FakePty implements NodePtyProcess {
  readonly pid = 4321
  private dataListener: ((data: string | Buffer) => void) | null = null
  private exitListener: ((e: { exitCode: number; signal?: number }) => void) | null = null
  write = vi.fn<(data: string | Buffer) => void>()
  resize = vi.fn<(columns: number, rows: number) => void>()
  kill = vi.fn<(signal?: string) => void>()

  onData(listener: (data: string | Buffer) => void) {
    this.dataListener = listener
    return { dispose: () => undefined }
  }

  onExit(listener: (e: { exitCode: number; signal?: number }) => void) {
    this.exitListener = listener
    return { dispose: () => undefined }
  }

  emitData(data: string | Buffer): void {
    this.dataListener?.(data)
  }

  emitExit(exitCode: number, signal?: number): void {
    this.exitListener?.(signal === undefined ? { exitCode } : { exitCode, signal })
  }
}

function setup(spawnImpl?: NodePtyModule['spawn']) {
  const fake = new FakePty()
  const spawn = vi.fn<NodePtyModule['spawn']>(spawnImpl ?? (() => fake))
  const driver = createNodePtyDriver({ spawn })
  return { fake, spawn, driver }
}

const OPTIONS: PtySpawnOptions = {
  command: ['bash', '-l'],
  size: { cols: 100, rows: 30 },
  cwd: os.tmpdir(),
  maxPendingInputBytes: 1024,
}

describe('node-pty driver', () => {
  it('spawns the command on a terminal of the requested size', async () => {
    const { spawn, driver } = setup()

    const handle = await driver.spawn(OPTIONS)

    expect(handle.pid).toBe(4321)
    expect(spawn).toHaveBeenCalledTimes(1)
    const [file, args, options] = spawn.mock.calls[0] ?? []
    expect(file).toBe('bash')
    expect(args).toEqual(['-l'])
    expect(options).toMatchObject<Partial<NodePtyOptions>>({
      name: 'xterm-256color',
      cols: 100,
      rows: 30,
      cwd: os.tmpdir(),
      encoding: null,
    })
    expect(options?.env['TERM']).toBe('xterm-256color')
  })

  it('refuses a working directory that does not exist', async () => {
    const { spawn, driver } = setup()

    await expect(driver.spawn({ ...OPTIONS, cwd: '/nonexistent/termbridge-cwd' })).rejects.toBeInstanceOf(SpawnError)
    expect(spawn).not.toHaveBeenCalled()
  })

  it('refuses an empty command', async () => {
    const { driver } = setup()

    await expect(driver.spawn({ ...OPTIONS, command: [] })).rejects.toThrow('No command to spawn')
  })

  it('wraps spawn failures', async () => {
    const { driver } = setup(() => {
      throw new Error('posix_spawnp failed.')
    })

    await expect(driver.spawn(OPTIONS)).rejects.toThrow('Failed to spawn bash: posix_spawnp failed.')
  })

  it('splits output into chunks of at most 8 KiB', async () => {
    const { fake, driver } = setup()
    const handle = await driver.spawn(OPTIONS)

    fake.emitData('x'.repeat(10_000))

    expect((await handle.output.next())?.length).toBe(8192)
    expect((await handle.output.next())?.length).toBe(1808)
  })

  it('closes output after the process exits', async () => {
    const { fake, driver } = setup()
    const handle = await driver.spawn(OPTIONS)

    fake.emitData('bye\r\n')
    fake.emitExit(0)

    expect((await handle.output.next())?.toString()).toBe('bye\r\n')
    expect(await handle.output.next()).toBeUndefined()
    await expect(handle.exited).resolves.toEqual({ exitCode: 0, signal: null })
  })

  it('writes input through to the terminal', async () => {
    const { fake, driver } = setup()
    const handle = await driver.spawn(OPTIONS)

    handle.write('ls\r')
    handle.write(Buffer.of(0x1b, 0x4d, 0x20, 37, 42))
    await tick()

    expect(fake.write.mock.calls).toEqual([['ls\r'], [Buffer.of(0x1b, 0x4d, 0x20, 37, 42)]])
  })

  it('writes mouse reports past column 95 as exactly five bytes', async () => {
    const { fake, driver } = setup()
    const handle = await driver.spawn(OPTIONS)

    handle.write(encodeMouseClick(100, 10, 0, true))
    await tick()

    expect(fake.write.mock.calls).toEqual([[Buffer.of(0x1b, 0x4d, 0x20, 132, 42)]])
  })

  it('passes output bytes through without decoding them', async () => {
    const { fake, driver } = setup()
    const handle = await driver.spawn(OPTIONS)

    fake.emitData(Buffer.of(0xff, 0xfe, 0x41, 0xc3))

    expect(await handle.output.next()).toEqual(Buffer.of(0xff, 0xfe, 0x41, 0xc3))
  })

  it('resizes the terminal', async () => {
    const { fake, driver } = setup()
    const handle = await driver.spawn(OPTIONS)

    expect(handle.resize({ cols: 120, rows: 40 }).ok).toBe(true)
    expect(fake.resize).toHaveBeenCalledWith(120, 40)
  })

  it('reports resize failures', async () => {
    const { fake, driver } = setup()
    const handle = await driver.spawn(OPTIONS)
    fake.resize.mockImplementation(() => {
      throw new Error('ioctl(2) failed, EBADF')
    })

    const result = handle.resize({ cols: 120, rows: 40 })

    expect(result.ok).toBe(false)
    if (!result.ok) expect(result.error.operation).toBe('resize')
  })

  it('kills the process only once', async () => {
    const { fake, driver } = setup()
    const handle = await driver.spawn(OPTIONS)

    expect(handle.kill().ok).toBe(true)
    expect(handle.kill().ok).toBe(true)

    expect(fake.kill).toHaveBeenCalledTimes(1)
    if (process.platform !== 'win32') expect(fake.kill).toHaveBeenCalledWith('SIGTERM')
  })

  it('does not signal a process that already exited', async () => {
    const { fake, driver } = setup()
    const handle = await driver.spawn(OPTIONS)
    fake.emitExit(0)

    expect(handle.kill().ok).toBe(true)
    expect(fake.kill).not.toHaveBeenCalled()
  })

  it('reports kill failures instead of throwing', async () => {
    const { fake, driver } = setup()
    const handle = await driver.spawn(OPTIONS)
    fake.kill.mockImplementation(() => {
      throw new Error('ESRCH')
    })

    const result = handle.kill()

    expect(result.ok).toBe(false)
    if (!result.ok) expect(result.error.code).toBe('PTY_IO')
  })
})
