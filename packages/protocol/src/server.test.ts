import { describe, expect, it } from 'vitest'
import { parseServerFrame, serializeServerMessage } from './server.js'

describe('serializeServerMessage', () => {
  it('prefixes output with tag 0', () => {
    const bytes = serializeServerMessage({ type: 'output', data: Buffer.of(0x1b, 0x5b, 0x48) })
    expect([...bytes]).toEqual([0x30, 0x1b, 0x5b, 0x48])
  })

  it('prefixes the window title with tag 1', () => {
    const bytes = serializeServerMessage({ type: 'set-window-title', title: 'bash (devbox)' })
    expect(bytes.toString('utf-8')).toBe('1bash (devbox)')
  })

  it('prefixes preferences with tag 2', () => {
    const bytes = serializeServerMessage({ type: 'set-preferences', preferences: '{"fontSize":14}' })
    expect(bytes.toString('utf-8')).toBe('2{"fontSize":14}')
  })

  it('encodes an empty output chunk as the bare tag', () => {
    expect([...serializeServerMessage({ type: 'output', data: new Uint8Array(0) })]).toEqual([0x30])
  })
})

describe('parseServerFrame', () => {
  it('decodes what serializeServerMessage produced', () => {
    const result = parseServerFrame(serializeServerMessage({ type: 'set-window-title', title: 'vim (box)' }))
    expect(result).toEqual({ ok: true, value: { type: 'set-window-title', title: 'vim (box)' } })
  })

  it('keeps output bytes opaque', () => {
    const result = parseServerFrame(Buffer.of(0x30, 0xff, 0x00))
    expect(result.ok).toBe(true)
    if (result.ok && result.value.type === 'output') {
      expect([...result.value.data]).toEqual([0xff, 0x00])
    }
  })

  it('rejects unknown tags', () => {
    const result = parseServerFrame(Buffer.from('7'))
    expect(result.ok).toBe(false)
    if (!result.ok) expect(result.error.message).toBe('Unknown command: 7')
  })
})
