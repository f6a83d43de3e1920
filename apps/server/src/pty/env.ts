// Environment for children: the server's own, minus unset entries, plus overrides.
export function childEnv(overrides: Record<string, string>): Record<string, string> {
  const env: Record<string, string> = {}
  for (const [key, value] of Object.entries(process.env)) {
    if (value !== undefined) env[key] = value
  }
  return { ...env, ...overrides }
}

export const TERMINAL_ENV = { TERM: 'xterm-256color' } as const
