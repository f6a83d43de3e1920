import pino from 'pino'

export interface LoggerOptions {
  name: string
  level?: string
  pretty?: boolean
}

export type Logger = pino.Logger

// Loggers created without an explicit level follow setDefaultLogLevel.
const followers = new Set<Logger>()
let defaultLevel: string | undefined

function defaultPretty(): boolean {
  const env = process.env['NODE_ENV']
  return env !== 'production' && env !== 'test'
}

export function createLogger(opts: LoggerOptions): Logger {
  const usePretty = opts.pretty ?? defaultPretty()
  const base: pino.LoggerOptions = {
    name: opts.name,
    level: opts.level ?? defaultLevel ?? process.env['LOG_LEVEL'] ?? 'info',
  }
  if (usePretty) {
    base.transport = { target: 'pino-pretty', options: { colorize: true } }
  }
  const logger = pino(base)
  if (opts.level === undefined) followers.add(logger)
  return logger
}

/** Applies a configured level to module loggers, including ones already created. */
export function setDefaultLogLevel(level: string): void {
  defaultLevel = level
  for (const logger of followers) logger.level = level
}
