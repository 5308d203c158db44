/**
 * Request Logger Middleware
 */

import { Request, Response, NextFunction } from 'express'
import { logger } from '../utils/logger'
import { httpRequestDuration, httpRequestTotal } from '../observability/metrics'

export const requestLogger = (req: Request, res: Response, next: NextFunction) => {
  const start = Date.now()

  res.on('finish', () => {
    const duration = Date.now() - start
    // Route pattern keeps label cardinality bounded
    const route = req.route?.path ? `${req.baseUrl}${String(req.route.path)}` : 'unmatched'
    const labels = { method: req.method, route, status: String(res.statusCode) }

    httpRequestTotal.inc(labels)
    httpRequestDuration.observe(labels, duration / 1000)

    logger.info('HTTP Request', {
      method: req.method,
      path: req.path,
      status: res.statusCode,
      duration
    })
  })

  next()
}
