// Single-byte ASCII command tags. One transport message carries one frame:
// tag byte followed by the payload, no length prefix.

// Client -> Server
export const INPUT = '0'
export const RESIZE_TERMINAL = '1'
export const PAUSE = '2'
export const RESUME = '3'
export const MOUSE_CLICK = '4'
export const MOUSE_DRAG = '5'
// The init frame is a bare JSON object, so its tag is the opening brace.
export const JSON_DATA = '{'

// Server -> Client
export const OUTPUT = '0'
export const SET_WINDOW_TITLE = '1'
export const SET_PREFERENCES = '2'

export type ProtocolVariant = 'plain' | 'mouse'

export function tagByte(tag: string): number {
  return tag.charCodeAt(0)
}
