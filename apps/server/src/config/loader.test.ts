import fs from 'node:fs'
import os from 'node:os'
import path from 'node:path'
import { afterEach, beforeEach, describe, expect, it } from 'vitest'
import { ConfigError } from '@termbridge/shared'
import { loadConfig } from './loader.js'

describe('loadConfig', () => {
  let dir: string
  let file: string

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'termbridge-config-'))
    file = path.join(dir, 'config.json')
    fs.writeFileSync(file, '{}')
  })

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true })
  })

  it('applies defaults', () => {
    const config = loadConfig({ env: {}, configFile: file })

    expect(config.port).toBe(7681)
    expect(config.host).toBe('0.0.0.0')
    expect(config.writable).toBe(false)
    expect(config.maxClients).toBe(0)
    expect(config.ptyBackend).toBe('auto')
    expect(config.preferences).toEqual({})
    expect(config.command).toEqual(process.platform === 'win32' ? ['cmd.exe'] : ['bash'])
  })

  it('reads the config file', () => {
    fs.writeFileSync(file, JSON.stringify({ port: 9000, command: ['htop'], mouse: true }))

    const config = loadConfig({ env: {}, configFile: file })

    expect(config.port).toBe(9000)
    expect(config.command).toEqual(['htop'])
    expect(config.mouse).toBe(true)
  })

  it('lets env vars override the file', () => {
    fs.writeFileSync(file, JSON.stringify({ port: 9000, writable: false }))

    const config = loadConfig({
      env: { TERMBRIDGE_PORT: '7000', TERMBRIDGE_WRITABLE: 'true', TERMBRIDGE_CREDENTIAL: 'test-secret' },
      configFile: file,
    })

    expect(config.port).toBe(7000)
    expect(config.writable).toBe(true)
    expect(config.credential).toBe('test-secret')
  })

  it('takes the command from trailing arguments', () => {
    const config = loadConfig({ env: {}, configFile: file, argv: ['python3', '-i'] })

    expect(config.command).toEqual(['python3', '-i'])
  })

  it('finds the file through TERMBRIDGE_CONFIG', () => {
    fs.writeFileSync(file, JSON.stringify({ maxClients: 3 }))

    const config = loadConfig({ env: { TERMBRIDGE_CONFIG: file } })

    expect(config.maxClients).toBe(3)
  })

  it('rejects invalid values', () => {
    expect(() => loadConfig({ env: { TERMBRIDGE_PTY_BACKEND: 'telnet' }, configFile: file })).toThrow(ConfigError)
    expect(() => loadConfig({ env: { TERMBRIDGE_PORT: 'eighty' }, configFile: file })).toThrow(ConfigError)
  })

  it('rejects a file that is not a JSON object', () => {
    fs.writeFileSync(file, '[1, 2]')

    expect(() => loadConfig({ env: {}, configFile: file })).toThrow(`Config file ${file} must contain a JSON object`)
  })
})
