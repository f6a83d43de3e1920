export { createPtyDriver } from './select.js'
export type { SelectDriverDeps } from './select.js'
export { createNodePtyDriver } from './node-pty-driver.js'
export type { NodePtyModule } from './node-pty-driver.js'
export { createPipeDriver, echoFor } from './pipe-driver.js'
export type { PipeChild, SpawnProcess } from './pipe-driver.js'
export { DEFAULT_PTY_SIZE, MAX_OUTPUT_CHUNK, chunkOutput, normalizeSize } from './types.js'
export type { PtyDriver, PtyDriverName, PtyExit, PtyHandle, PtySize, PtySpawnOptions } from './types.js'
