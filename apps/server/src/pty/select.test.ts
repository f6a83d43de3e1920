import { describe, expect, it, vi } from 'vitest'
import type { NodePtyModule } from './node-pty-driver.js'
import { createPtyDriver } from './select.js'

const fakeNodePty: NodePtyModule = {
  spawn: vi.fn(),
}

describe('createPtyDriver', () => {
  it('uses the pipe driver when asked, without loading node-pty', async () => {
    const loadNodePty = vi.fn(async () => fakeNodePty)

    const driver = await createPtyDriver('pipe', { loadNodePty })

    expect(driver.name).toBe('pipe')
    expect(loadNodePty).not.toHaveBeenCalled()
  })

  it('prefers node-pty in auto mode', async () => {
    const driver = await createPtyDriver('auto', { loadNodePty: async () => fakeNodePty })

    expect(driver.name).toBe('pty')
  })

  it('falls back to pipes when node-pty cannot load', async () => {
    const driver = await createPtyDriver('auto', {
      loadNodePty: async () => {
        throw new Error('Cannot find module pty.node')
      },
    })

    expect(driver.name).toBe('pipe')
  })

  it('fails when node-pty is required but missing', async () => {
    await expect(
      createPtyDriver('pty', {
        loadNodePty: async () => {
          throw new Error('Cannot find module pty.node')
        },
      }),
    ).rejects.toThrow('Cannot find module pty.node')
  })
})
