import 'dotenv/config'

import { runWebserver } from './src/services/webserver.js'
import { getBaseEnvironment } from './src/utils/env.js'
import { createLogger, LogLevel } from './src/utils/logger.js'

const bootLogger = createLogger(LogLevel.INFO)

async function bootstrap() {
  const baseEnv = getBaseEnvironment()
  const logger = createLogger(baseEnv.logLevel)
  const server = runWebserver(baseEnv, logger)

  await new Promise<void>((resolve, reject) => {
    server.once('listening', resolve)
    server.once('error', reject)
  })

  const shutdown = (signal: NodeJS.Signals) => {
    logger.info(`Received ${signal}, closing HTTP server`)
    server.close(err => {
      if (err) {
        logger.error('Failed to close HTTP server', err)
        process.exit(1)
      }
      process.exit(0)
    })
  }
  process.once('SIGINT', shutdown)
  process.once('SIGTERM', shutdown)

  logger.info('Timestamp microservice initialized')
}

bootstrap().catch(err => {
  bootLogger.error('Failed to bootstrap timestamp microservice', err)
  process.exit(1)
})
