/**
 * Prometheus Metrics Setup
 */

import { createServer } from 'http'
import type { Server } from 'http'
import { register, collectDefaultMetrics, Counter, Histogram } from 'prom-client'
import { logger } from '../utils/logger'

// Collect default metrics (CPU, memory, etc.)
collectDefaultMetrics({
  prefix: 'keyscout_api_'
})

export const httpRequestDuration = new Histogram({
  name: 'keyscout_api_http_request_duration_seconds',
  help: 'Duration of HTTP requests in seconds',
  labelNames: ['method', 'route', 'status']
})

export const httpRequestTotal = new Counter({
  name: 'keyscout_api_http_requests_total',
  help: 'Total number of HTTP requests',
  labelNames: ['method', 'route', 'status']
})

export const chatTurnsTotal = new Counter({
  name: 'keyscout_api_chat_turns_total',
  help: 'Chat turns by classified intent and outcome',
  labelNames: ['intent', 'outcome']
})

export const secretOperationsTotal = new Counter({
  name: 'keyscout_api_secret_operations_total',
  help: 'Direct secret-browser and analytics operations',
  labelNames: ['operation', 'status']
})

/**
 * Start Prometheus metrics server
 */
export function startMetricsServer(port: number): Server {
  const server = createServer((req, res) => {
    if (req.url !== '/metrics') {
      res.statusCode = 404
      res.end('Not Found')
      return
    }

    register.metrics().then(
      body => {
        res.setHeader('Content-Type', register.contentType)
        res.end(body)
      },
      (error: unknown) => {
        logger.error('Failed to collect metrics', { error: error instanceof Error ? error.message : String(error) })
        res.statusCode = 500
        res.end('Metrics unavailable')
      }
    )
  })

  server.listen(port, () => {
    logger.info(`Metrics server listening on http://localhost:${port}/metrics`)
  })
  return server
}
