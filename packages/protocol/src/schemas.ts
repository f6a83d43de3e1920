import { z } from 'zod'

const u16 = z.number().int().min(0).max(0xffff)
const u8 = z.number().int().min(0).max(0xff)

// ---------------------------------------------------------------------------
// Client -> Server JSON payloads
// ---------------------------------------------------------------------------

export const InitPayloadSchema = z.object({
  columns: u16.default(0),
  rows: u16.default(0),
  AuthToken: z.string().nullable().default(null),
})
export type InitPayload = z.infer<typeof InitPayloadSchema>

export const ResizePayloadSchema = z.object({
  columns: u16,
  rows: u16,
})
export type ResizePayload = z.infer<typeof ResizePayloadSchema>

export const MouseClickPayloadSchema = z.object({
  x: u16,
  y: u16,
  button: u8,
  pressed: z.boolean(),
})
export type MouseClickPayload = z.infer<typeof MouseClickPayloadSchema>

export const MouseDragPayloadSchema = z.object({
  x: u16,
  y: u16,
  button: u8,
  start_x: u16,
  start_y: u16,
})
export type MouseDragPayload = z.infer<typeof MouseDragPayloadSchema>
