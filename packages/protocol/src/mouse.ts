// X10 mouse reports: ESC 'M' <button-state> <col + 32> <row + 32>.
// A single byte carries each coordinate, so anything past 223 is clamped.

const ESC = 0x1b
const REPORT_PREFIX = 0x4d // 'M'
const COORD_OFFSET = 32
export const MAX_MOUSE_COORD = 0xff - COORD_OFFSET

const PRESS_STATES: ReadonlyMap<number, number> = new Map([
  [0, 0x20], // left
  [1, 0x21], // middle
  [2, 0x22], // right
])
const RELEASE_STATE = 0x23
const DRAG_FLAG = 0x40

function coordByte(value: number): number {
  return Math.min(Math.max(value, 0), MAX_MOUSE_COORD) + COORD_OFFSET
}

function report(buttonState: number, x: number, y: number): Buffer {
  return Buffer.of(ESC, REPORT_PREFIX, buttonState, coordByte(x), coordByte(y))
}

export function mouseButtonState(button: number, pressed: boolean): number {
  if (!pressed) return RELEASE_STATE
  return PRESS_STATES.get(button) ?? RELEASE_STATE
}

export function encodeMouseClick(x: number, y: number, button: number, pressed: boolean): Buffer {
  return report(mouseButtonState(button, pressed), x, y)
}

// Unknown buttons drag as the left button.
export function encodeMouseDrag(x: number, y: number, button: number): Buffer {
  const press = PRESS_STATES.get(button) ?? 0x20
  return report(press | DRAG_FLAG, x, y)
}
