import { createLogger, errorMessage } from '@termbridge/shared'
import type { PtyBackend } from '../config/schema.js'
import { createNodePtyDriver, ensureSpawnHelperExecutable, type NodePtyModule } from './node-pty-driver.js'
import { createPipeDriver, type SpawnProcess } from './pipe-driver.js'
import type { PtyDriver } from './types.js'

const logger = createLogger({ name: 'pty:select' })

export interface SelectDriverDeps {
  loadNodePty?: () => Promise<NodePtyModule>
  spawnProcess?: SpawnProcess
}

const loadNodePtyModule = async (): Promise<NodePtyModule> => {
  const pty = await import('node-pty')
  ensureSpawnHelperExecutable()
  return pty
}

/**
 * 'pty' requires node-pty, 'pipe' forces the pipe shim, 'auto' prefers
 * node-pty and falls back to the shim when the native addon cannot load.
 */
export async function createPtyDriver(backend: PtyBackend, deps: SelectDriverDeps = {}): Promise<PtyDriver> {
  const load = deps.loadNodePty ?? loadNodePtyModule

  if (backend === 'pipe') {
    return createPipeDriver(deps.spawnProcess)
  }

  try {
    const driver = createNodePtyDriver(await load())
    logger.debug({ backend }, 'Using node-pty driver')
    return driver
  } catch (e) {
    if (backend === 'pty') throw e
    logger.warn({ err: errorMessage(e) }, 'node-pty unavailable, falling back to pipe driver')
    return createPipeDriver(deps.spawnProcess)
  }
}
