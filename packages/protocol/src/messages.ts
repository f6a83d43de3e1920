export interface InitMessage {
  type: 'init'
  columns: number
  rows: number
  authToken: string | null
}

export interface InputMessage {
  type: 'input'
  data: string
}

export interface ResizeMessage {
  type: 'resize'
  cols: number
  rows: number
}

export interface PauseMessage {
  type: 'pause'
}

export interface ResumeMessage {
  type: 'resume'
}

export interface MouseClickMessage {
  type: 'mouse-click'
  x: number
  y: number
  /** 0 = left, 1 = middle, 2 = right */
  button: number
  pressed: boolean
}

export interface MouseDragMessage {
  type: 'mouse-drag'
  x: number
  y: number
  button: number
  startX: number
  startY: number
}

export type ClientMessage =
  | InitMessage
  | InputMessage
  | ResizeMessage
  | PauseMessage
  | ResumeMessage
  | MouseClickMessage
  | MouseDragMessage

export interface OutputMessage {
  type: 'output'
  data: Uint8Array
}

export interface SetWindowTitleMessage {
  type: 'set-window-title'
  title: string
}

export interface SetPreferencesMessage {
  type: 'set-preferences'
  /** JSON text, forwarded as-is */
  preferences: string
}

export type ServerMessage = OutputMessage | SetWindowTitleMessage | SetPreferencesMessage
