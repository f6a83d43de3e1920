import fs from 'node:fs'
import os from 'node:os'
import path from 'node:path'
import {
  ConfigError,
  getEnvBool,
  getEnvInt,
  getOptionalEnv,
  type EnvSource,
} from '@termbridge/shared'
import { ServerConfigSchema, type ServerConfig } from './schema.js'

const CONFIG_DIR = path.join(os.homedir(), '.termbridge')
const CONFIG_FILE = path.join(CONFIG_DIR, 'config.json')

export interface LoadConfigOptions {
  env?: EnvSource
  // Trailing command-line arguments; when present they replace `command`.
  argv?: string[]
  configFile?: string
}

function expandHome(p: string): string {
  return p.startsWith('~') ? path.join(os.homedir(), p.slice(1)) : p
}

function readConfigFile(file: string): Record<string, unknown> {
  let parsed: unknown
  try {
    parsed = JSON.parse(fs.readFileSync(file, 'utf-8'))
  } catch (e) {
    throw new ConfigError(`Could not read config file ${file}`, e)
  }
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    throw new ConfigError(`Config file ${file} must contain a JSON object`)
  }
  return Object.fromEntries(Object.entries(parsed))
}

function envOverlays(env: EnvSource): Record<string, unknown> {
  const overlays: Record<string, unknown> = {
    port: getEnvInt('TERMBRIDGE_PORT', env),
    host: getOptionalEnv('TERMBRIDGE_HOST', env),
    cwd: getOptionalEnv('TERMBRIDGE_CWD', env),
    credential: getOptionalEnv('TERMBRIDGE_CREDENTIAL', env),
    writable: getEnvBool('TERMBRIDGE_WRITABLE', env),
    checkOrigin: getEnvBool('TERMBRIDGE_CHECK_ORIGIN', env),
    maxClients: getEnvInt('TERMBRIDGE_MAX_CLIENTS', env),
    once: getEnvBool('TERMBRIDGE_ONCE', env),
    mouse: getEnvBool('TERMBRIDGE_MOUSE', env),
    ptyBackend: getOptionalEnv('TERMBRIDGE_PTY_BACKEND', env),
    logLevel: getOptionalEnv('LOG_LEVEL', env),
  }
  return Object.fromEntries(Object.entries(overlays).filter(([, value]) => value !== undefined))
}

export function loadConfig(opts: LoadConfigOptions = {}): ServerConfig {
  const env = opts.env ?? process.env

  // Explicit file wins; the default location is optional.
  const explicitFile = opts.configFile ?? getOptionalEnv('TERMBRIDGE_CONFIG', env)
  let raw: Record<string, unknown> = {}
  if (explicitFile) {
    raw = readConfigFile(expandHome(explicitFile))
  } else if (fs.existsSync(CONFIG_FILE)) {
    raw = readConfigFile(CONFIG_FILE)
  }

  // Env var overlays (explicit env always wins)
  let overlays: Record<string, unknown>
  try {
    overlays = envOverlays(env)
  } catch (e) {
    throw new ConfigError(e instanceof Error ? e.message : String(e))
  }
  raw = { ...raw, ...overlays }

  if (opts.argv && opts.argv.length > 0) {
    raw['command'] = opts.argv
  }

  const parsed = ServerConfigSchema.safeParse(raw)
  if (!parsed.success) {
    throw new ConfigError(`Invalid configuration: ${parsed.error.message}`, parsed.error.issues)
  }

  const config = parsed.data
  if (config.cwd) config.cwd = expandHome(config.cwd)
  return config
}

