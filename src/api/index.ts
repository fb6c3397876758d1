import { Router } from 'express'
import { convertDate } from '../timestamp/converter.js'
import { toErrorBody } from '../timestamp/errors.js'
import type { Logger } from '../utils/logger.js'
import { type Clock, currentTimestamp, systemClock } from '../utils/time.js'

export const HELLO_HTML = '<h1>Hello World!</h1>'

export type ApiRouterOptions = {
  logger: Logger
  clock?: Clock
}

export function createApiRouter({ logger, clock = systemClock }: ApiRouterOptions): Router {
  const router = Router()

  router.get('/', (_req, res) => {
    res.type('html').send(HELLO_HTML)
  })

  /**
   * Current time, no input.
   */
  router.get('/api', (_req, res) => {
    res.json(currentTimestamp(clock))
  })

  /**
   * `:date` is either `YYYY-MM-DD` or a Unix timestamp in seconds.
   * Timestamps are truncated to midnight UTC of their calendar day.
   */
  router.get('/api/:date', (req, res) => {
    const outcome = convertDate(req.params.date, logger)
    if (!outcome.ok) {
      return res.status(422).json(toErrorBody())
    }
    res.json(outcome.value)
  })

  router.all(['/', '/api', '/api/:date'], (_req, res) => {
    res.set('Allow', 'GET, HEAD').status(405).end()
  })

  return router
}
