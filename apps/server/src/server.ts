import Fastify from 'fastify'
import { createLogger } from '@termbridge/shared'
import type { ServerConfig } from './config/schema.js'
import authPlugin from './auth/middleware.js'
import type { PtyDriver } from './pty/index.js'
import { TerminalAcceptor } from './ws/acceptor.js'
import { attachWebSocketServer } from './ws/server.js'

export interface BuildServerOptions {
  driver: PtyDriver
  // Called when a `once` server's session has ended.
  onFinished?: () => void
}

export async function buildServer(config: ServerConfig, opts: BuildServerOptions) {
  const logger = createLogger({ name: 'termbridge', level: config.logLevel })

  const fastify = Fastify({
    logger: false, // we use our own pino instance
  })

  const acceptor = new TerminalAcceptor({
    config,
    driver: opts.driver,
    logger,
    onFinished: opts.onFinished,
  })

  // Health check (no auth)
  fastify.get('/health', async () => ({
    status: 'ok',
    ts: new Date().toISOString(),
    sessions: acceptor.activeSessions,
  }))

  await fastify.register(authPlugin, { credential: config.credential })

  // Clients read the token here and send it back in their init frame.
  fastify.get('/token', { preHandler: fastify.authenticate }, async () => ({
    token: config.credential ?? '',
  }))

  const wss = attachWebSocketServer(fastify, acceptor, logger)

  let closing: Promise<void> | null = null
  const close = (): Promise<void> => {
    closing ??= (async () => {
      await acceptor.shutdown()
      for (const client of wss.clients) client.terminate()
      wss.close()
      await fastify.close()
    })()
    return closing
  }

  return { fastify, logger, wss, acceptor, close }
}
