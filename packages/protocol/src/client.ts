import { z } from 'zod'
import { ProtocolError, assertNever, err, ok, type Result } from '@termbridge/shared'
import {
  INPUT,
  JSON_DATA,
  MOUSE_CLICK,
  MOUSE_DRAG,
  PAUSE,
  RESIZE_TERMINAL,
  RESUME,
  tagByte,
  type ProtocolVariant,
} from './tags.js'
import {
  InitPayloadSchema,
  MouseClickPayloadSchema,
  MouseDragPayloadSchema,
  ResizePayloadSchema,
} from './schemas.js'
import type { ClientMessage } from './messages.js'

function decodeJson<S extends z.ZodTypeAny>(
  schema: S,
  bytes: Uint8Array,
): Result<z.output<S>, ProtocolError> {
  let raw: unknown
  try {
    raw = JSON.parse(Buffer.from(bytes).toString('utf-8'))
  } catch (e) {
    return err(new ProtocolError(e instanceof Error ? e.message : String(e)))
  }
  const parsed = schema.safeParse(raw)
  if (!parsed.success) {
    return err(new ProtocolError(parsed.error.message, parsed.error.issues))
  }
  return ok(parsed.data)
}

/**
 * Decode one client frame. The first byte is the command tag; tags 4 and 5
 * only exist in the mouse variant.
 */
export function parseClientFrame(
  frame: Uint8Array,
  variant: ProtocolVariant = 'plain',
): Result<ClientMessage, ProtocolError> {
  if (frame.length === 0) {
    return err(new ProtocolError('Empty frame'))
  }

  const cmd = String.fromCharCode(frame[0] ?? 0)
  const payload = frame.subarray(1)

  switch (cmd) {
    case INPUT:
      // Invalid UTF-8 is replaced, not rejected.
      return ok({ type: 'input', data: Buffer.from(payload).toString('utf-8') })
    case RESIZE_TERMINAL: {
      const decoded = decodeJson(ResizePayloadSchema, payload)
      if (!decoded.ok) return decoded
      return ok({ type: 'resize', cols: decoded.value.columns, rows: decoded.value.rows })
    }
    case PAUSE:
      return ok({ type: 'pause' })
    case RESUME:
      return ok({ type: 'resume' })
    case JSON_DATA: {
      const decoded = decodeJson(InitPayloadSchema, frame)
      if (!decoded.ok) return decoded
      const { columns, rows, AuthToken } = decoded.value
      return ok({ type: 'init', columns, rows, authToken: AuthToken })
    }
    case MOUSE_CLICK: {
      if (variant !== 'mouse') break
      const decoded = decodeJson(MouseClickPayloadSchema, payload)
      if (!decoded.ok) return decoded
      return ok({ type: 'mouse-click', ...decoded.value })
    }
    case MOUSE_DRAG: {
      if (variant !== 'mouse') break
      const decoded = decodeJson(MouseDragPayloadSchema, payload)
      if (!decoded.ok) return decoded
      const { x, y, button, start_x, start_y } = decoded.value
      return ok({ type: 'mouse-drag', x, y, button, startX: start_x, startY: start_y })
    }
  }

  return err(new ProtocolError(`Unknown command: ${cmd}`, { byte: frame[0] }))
}

function tagged(tag: string, payload: string): Buffer {
  return Buffer.concat([Buffer.of(tagByte(tag)), Buffer.from(payload, 'utf-8')])
}

/** Encode a client message the way a browser client puts it on the wire. */
export function encodeClientMessage(message: ClientMessage): Buffer {
  switch (message.type) {
    case 'init':
      return Buffer.from(
        JSON.stringify({ columns: message.columns, rows: message.rows, AuthToken: message.authToken }),
        'utf-8',
      )
    case 'input':
      return tagged(INPUT, message.data)
    case 'resize':
      return tagged(RESIZE_TERMINAL, JSON.stringify({ columns: message.cols, rows: message.rows }))
    case 'pause':
      return Buffer.of(tagByte(PAUSE))
    case 'resume':
      return Buffer.of(tagByte(RESUME))
    case 'mouse-click':
      return tagged(
        MOUSE_CLICK,
        JSON.stringify({ x: message.x, y: message.y, button: message.button, pressed: message.pressed }),
      )
    case 'mouse-drag':
      return tagged(
        MOUSE_DRAG,
        JSON.stringify({
          x: message.x,
          y: message.y,
          button: message.button,
          start_x: message.startX,
          start_y: message.startY,
        }),
      )
    default:
      return assertNever(message)
  }
}
