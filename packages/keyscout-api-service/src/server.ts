/**
 * keyscout API Service - Main Server
 *
 * Express server behind the dashboard
 */

import express from 'express'
import http from 'http'
import 'express-async-errors'
import { ConfigurationError, validateEnvironmentConfig } from 'keyscout'
import { config } from './config'
import { setupMiddleware } from './middleware'
import { setupRoutes } from './routes'
import { KeyscoutService } from './services/keyscout-service'
import { logger } from './utils/logger'
import { startMetricsServer } from './observability/metrics'

function startServer() {
  const app = express()
  const server = http.createServer(app)

  try {
    validateEnvironmentConfig()

    logger.info('Initializing keyscout service...')
    const service = new KeyscoutService(config)

    // Setup middleware (auth, rate limiting, logging, etc.)
    setupMiddleware(app, config)

    // Setup REST API routes
    setupRoutes(app, service, config)

    // Start metrics server (Prometheus)
    const metricsServer = config.metrics.enabled ? startMetricsServer(config.metrics.port) : undefined

    // Start HTTP server
    server.listen(config.port, config.host, () => {
      logger.info('keyscout API Service started', {
        port: config.port,
        host: config.host,
        env: config.env,
        metrics: config.metrics.enabled ? `http://localhost:${config.metrics.port}/metrics` : 'disabled',
        docs: `http://localhost:${config.port}/docs`,
        health: `http://localhost:${config.port}/api/v1/health`
      })
    })

    // Graceful shutdown
    const shutdown = (signal: string) => {
      logger.info(`${signal} received, shutting down gracefully...`)

      metricsServer?.close()
      server.close(() => {
        logger.info('HTTP server closed')
        process.exit(0)
      })

      // Force shutdown after timeout
      setTimeout(() => {
        logger.error('Forced shutdown after timeout')
        process.exit(1)
      }, 10000).unref()
    }

    process.on('SIGTERM', () => shutdown('SIGTERM'))
    process.on('SIGINT', () => shutdown('SIGINT'))

  } catch (error) {
    if (error instanceof ConfigurationError) {
      logger.error(error.message, { missing: error.details?.missing })
    } else {
      logger.error('Failed to start server', { error: error instanceof Error ? error.message : String(error) })
    }
    process.exit(1)
  }
}

// Start server
startServer()
