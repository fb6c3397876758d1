import type { Server } from 'node:http'
import express, { type ErrorRequestHandler, type Express, type RequestHandler } from 'express'
import { createApiRouter } from '../api/index.js'
import { toErrorBody } from '../timestamp/errors.js'
import type { BaseEnvironment } from '../utils/env.js'
import type { Logger } from '../utils/logger.js'
import type { Clock } from '../utils/time.js'

export type AppOptions = {
  logger: Logger
  clock?: Clock
}

function requestTracer(logger: Logger): RequestHandler {
  return (req, res, next) => {
    const startedAt = process.hrtime.bigint()
    logger.debug(`--> ${req.method} ${req.originalUrl}`)
    res.on('finish', () => {
      const elapsedMs = Number((process.hrtime.bigint() - startedAt) / BigInt(1_000_000))
      logger.debug(`<-- ${req.method} ${req.originalUrl} ${res.statusCode} ${elapsedMs}ms`)
    })
    next()
  }
}

const notFound: RequestHandler = (_req, res) => {
  res.status(404).end()
}

function errorHandler(logger: Logger): ErrorRequestHandler {
  return (err: unknown, req, res, _next) => {
    // Express fails to percent-decode the `:date` segment before any route runs.
    if (err instanceof URIError) {
      logger.error(`Error while decoding ${req.originalUrl}: ${err.message}`)
      return res.status(422).json(toErrorBody())
    }
    logger.error(`Error in ${req.method} ${req.originalUrl}:`, err)
    res.status(500).json({ error: 'Internal server error' })
  }
}

export function createApp({ logger, clock }: AppOptions): Express {
  const app = express()
  app.disable('x-powered-by')
  app.use(requestTracer(logger))
  app.use(createApiRouter({ logger, clock }))
  app.use(notFound)
  app.use(errorHandler(logger))
  return app
}

export function runWebserver(environment: BaseEnvironment, logger: Logger): Server {
  const app = createApp({ logger })
  const { host, port } = environment
  return app.listen(port, host, () => {
    logger.info(`HTTP up on ${host}:${port}`)
  })
}
