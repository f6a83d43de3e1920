export type EnvSource = Record<string, string | undefined>

export function getOptionalEnv(key: string, env: EnvSource = process.env): string | undefined {
  const val = env[key]
  return val === undefined || val === '' ? undefined : val
}

export function getEnvInt(key: string, env: EnvSource = process.env): number | undefined {
  const val = getOptionalEnv(key, env)
  if (val === undefined) return undefined
  const n = parseInt(val, 10)
  if (isNaN(n)) throw new Error(`Environment variable '${key}' must be an integer, got: '${val}'`)
  return n
}

const TRUTHY = new Set(['1', 'true', 'yes', 'on'])
const FALSY = new Set(['0', 'false', 'no', 'off'])

export function getEnvBool(key: string, env: EnvSource = process.env): boolean | undefined {
  const val = getOptionalEnv(key, env)
  if (val === undefined) return undefined
  const normalized = val.toLowerCase()
  if (TRUTHY.has(normalized)) return true
  if (FALSY.has(normalized)) return false
  throw new Error(`Environment variable '${key}' must be a boolean, got: '${val}'`)
}
