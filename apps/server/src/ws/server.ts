import { STATUS_CODES } from 'node:http'
import type { Duplex } from 'node:stream'
import { WebSocketServer } from 'ws'
import type { FastifyInstance } from 'fastify'
import type { Logger } from '@termbridge/shared'
import type { TerminalAcceptor } from './acceptor.js'
import { WebSocketPeer } from './peer.js'

export const WS_PATH = '/ws'

function rejectUpgrade(socket: Duplex, status: number): void {
  socket.write(`HTTP/1.1 ${status} ${STATUS_CODES[status] ?? ''}\r\nConnection: close\r\n\r\n`)
  socket.destroy()
}

export function attachWebSocketServer(
  fastify: FastifyInstance,
  acceptor: TerminalAcceptor,
  logger: Logger,
): WebSocketServer {
  const wss = new WebSocketServer({ noServer: true })

  fastify.server.on('upgrade', (request, socket, head) => {
    const url = new URL(request.url ?? '', 'http://localhost')
    if (url.pathname !== WS_PATH) {
      rejectUpgrade(socket, 404)
      return
    }

    const rejection = acceptor.admit(request.headers)
    if (rejection) {
      rejectUpgrade(socket, rejection.status)
      logger.warn({ status: rejection.status, origin: request.headers.origin }, rejection.message)
      return
    }

    wss.handleUpgrade(request, socket, head, (ws) => {
      wss.emit('connection', ws, request)
    })
  })

  wss.on('connection', (ws) => {
    acceptor.accept(new WebSocketPeer(ws))
  })

  wss.on('error', (err) => {
    logger.error({ err }, 'WebSocket server error')
  })

  return wss
}
