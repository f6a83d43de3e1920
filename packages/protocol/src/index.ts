export {
  INPUT,
  RESIZE_TERMINAL,
  PAUSE,
  RESUME,
  MOUSE_CLICK,
  MOUSE_DRAG,
  JSON_DATA,
  OUTPUT,
  SET_WINDOW_TITLE,
  SET_PREFERENCES,
} from './tags.js'
export type { ProtocolVariant } from './tags.js'
export type {
  ClientMessage,
  InitMessage,
  InputMessage,
  ResizeMessage,
  PauseMessage,
  ResumeMessage,
  MouseClickMessage,
  MouseDragMessage,
  ServerMessage,
  OutputMessage,
  SetWindowTitleMessage,
  SetPreferencesMessage,
} from './messages.js'
export {
  InitPayloadSchema,
  ResizePayloadSchema,
  MouseClickPayloadSchema,
  MouseDragPayloadSchema,
} from './schemas.js'
export { parseClientFrame, encodeClientMessage } from './client.js'
export { serializeServerMessage, parseServerFrame } from './server.js'
export { encodeMouseClick, encodeMouseDrag, mouseButtonState, MAX_MOUSE_COORD } from './mouse.js'
