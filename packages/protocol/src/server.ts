import { ProtocolError, assertNever, err, ok, type Result } from '@termbridge/shared'
import { OUTPUT, SET_PREFERENCES, SET_WINDOW_TITLE, tagByte } from './tags.js'
import type { ServerMessage } from './messages.js'

function withTag(tag: string, payload: Uint8Array): Buffer {
  const frame = Buffer.allocUnsafe(1 + payload.length)
  frame[0] = tagByte(tag)
  frame.set(payload, 1)
  return frame
}

export function serializeServerMessage(message: ServerMessage): Buffer {
  switch (message.type) {
    case 'output':
      return withTag(OUTPUT, message.data)
    case 'set-window-title':
      return withTag(SET_WINDOW_TITLE, Buffer.from(message.title, 'utf-8'))
    case 'set-preferences':
      return withTag(SET_PREFERENCES, Buffer.from(message.preferences, 'utf-8'))
    default:
      return assertNever(message)
  }
}

/** Client-side decoding of a server frame. */
export function parseServerFrame(frame: Uint8Array): Result<ServerMessage, ProtocolError> {
  if (frame.length === 0) {
    return err(new ProtocolError('Empty frame'))
  }

  const cmd = String.fromCharCode(frame[0] ?? 0)
  const payload = Buffer.from(frame.subarray(1))

  switch (cmd) {
    case OUTPUT:
      return ok({ type: 'output', data: payload })
    case SET_WINDOW_TITLE:
      return ok({ type: 'set-window-title', title: payload.toString('utf-8') })
    case SET_PREFERENCES:
      return ok({ type: 'set-preferences', preferences: payload.toString('utf-8') })
    default:
      return err(new ProtocolError(`Unknown command: ${cmd}`, { byte: frame[0] }))
  }
}
