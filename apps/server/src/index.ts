import { errorMessage, isAppError, setDefaultLogLevel } from '@termbridge/shared'
import { loadConfig } from './config/loader.js'
import { createPtyDriver } from './pty/index.js'
import { buildServer } from './server.js'

async function main() {
  const config = loadConfig({ argv: process.argv.slice(2) })
  setDefaultLogLevel(config.logLevel)
  const driver = await createPtyDriver(config.ptyBackend)

  let stop: (reason: string) => void = () => undefined
  const { fastify, logger, close } = await buildServer(config, {
    driver,
    onFinished: () => stop('once'),
  })

  stop = (reason) => {
    logger.info({ reason }, 'Shutting down')
    close().then(
      () => process.exit(0),
      (err: unknown) => {
        logger.error({ err: errorMessage(err) }, 'Shutdown failed')
        process.exit(1)
      },
    )
  }
  process.once('SIGINT', () => stop('SIGINT'))
  process.once('SIGTERM', () => stop('SIGTERM'))

  await fastify.listen({ port: config.port, host: config.host })
  logger.info(
    { port: config.port, host: config.host, command: config.command, driver: driver.name, writable: config.writable },
    'Listening',
  )
}

main().catch((err: unknown) => {
  if (isAppError(err)) console.error(`Fatal error [${err.code}]: ${err.message}`)
  else console.error('Fatal error:', err)
  process.exit(1)
})
