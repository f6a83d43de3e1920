import { WebSocket, type RawData } from 'ws'
import { Channel, TransportError } from '@termbridge/shared'
import type { PeerConnection } from '../session/peer.js'

function toBuffer(data: RawData): Buffer {
  if (Buffer.isBuffer(data)) return data
  if (Array.isArray(data)) return Buffer.concat(data)
  return Buffer.from(data)
}

/**
 * Adapts a `ws` socket to the session's peer interface. Text and binary
 * messages are both treated as frames; outbound frames are always binary.
 */
export class WebSocketPeer implements PeerConnection {
  private readonly inbox = new Channel<Buffer>()

  constructor(private readonly socket: WebSocket) {
    socket.on('message', (data) => {
      this.inbox.push(toBuffer(data))
    })
    socket.on('close', () => {
      this.inbox.close()
    })
    socket.on('error', (e) => {
      this.inbox.close(new TransportError(e.message))
    })
  }

  send(frame: Buffer): Promise<void> {
    if (this.socket.readyState !== WebSocket.OPEN) {
      return Promise.reject(new TransportError('WebSocket is not open'))
    }
    return new Promise((resolve, reject) => {
      this.socket.send(frame, { binary: true }, (e) => {
        if (e) reject(new TransportError(e.message))
        else resolve()
      })
    })
  }

  receive(): Promise<Uint8Array | null> {
    return this.inbox.next().then((frame) => frame ?? null)
  }

  close(): void {
    this.inbox.close()
    if (this.socket.readyState === WebSocket.OPEN || this.socket.readyState === WebSocket.CONNECTING) {
      this.socket.close(1000)
    }
  }
}
