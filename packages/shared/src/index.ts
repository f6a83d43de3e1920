export {
  AppError,
  ProtocolError,
  AuthError,
  SpawnError,
  PtyIoError,
  InputOverflowError,
  TransportError,
  ConfigError,
  isAppError,
  errorMessage,
} from './errors.js'
export { ok, err, trySync } from './result.js'
export type { Ok, Err, Result } from './result.js'
export { assertNever } from './assert.js'
export { getOptionalEnv, getEnvInt, getEnvBool } from './env.js'
export type { EnvSource } from './env.js'
export { newSessionId } from './ids.js'
export { createLogger, setDefaultLogLevel } from './logger.js'
export type { Logger, LoggerOptions } from './logger.js'
export { Channel } from './channel.js'
export type { ChannelOptions } from './channel.js'
