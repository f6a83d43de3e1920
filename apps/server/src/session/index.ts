export { TerminalSession, windowTitle } from './session.js'
export type { CloseReason, SessionSettings, SessionState, TerminalSessionOptions } from './session.js'
export type { PeerConnection } from './peer.js'
