/**
 * API Routes Setup
 */

import { Express } from 'express'
import type { Config } from './config'
import type { KeyscoutService } from './services/keyscout-service'
import { errorHandler } from './middleware/error-handler'

// Import API routers
import { createChatRouter } from './api/v1/chat'
import { createSecretsRouter } from './api/v1/secrets'
import { createAnalyticsRouter } from './api/v1/analytics'

export const API_VERSION = '0.1.0'

export function setupRoutes(app: Express, service: KeyscoutService, config: Config) {
  // Health check
  app.get('/api/v1/health', (req, res) => {
    res.json({
      status: 'ok',
      version: API_VERSION,
      timestamp: new Date().toISOString(),
      env: config.env
    })
  })

  // API Documentation
  app.get('/docs', (req, res) => {
    res.json({
      message: 'keyscout API Documentation',
      version: 'v1',
      endpoints: {
        health: 'GET /api/v1/health',
        chat: 'POST /api/v1/chat { message, sessionId? }',
        transcript: 'GET|DELETE /api/v1/chat/:sessionId',
        secrets: 'GET /api/v1/secrets?pathPrefix=&type=',
        value: 'GET /api/v1/secrets/value?path=&type=',
        describe: 'GET /api/v1/secrets/describe?path=',
        counts: 'GET /api/v1/analytics/counts',
        breakdown: 'GET /api/v1/analytics/breakdown'
      }
    })
  })

  // Mount API routers
  app.use('/api/v1/chat', createChatRouter(service))
  app.use('/api/v1/secrets', createSecretsRouter(service))
  app.use('/api/v1/analytics', createAnalyticsRouter(service))

  // 404 handler
  app.use((req, res) => {
    res.status(404).json({
      error: 'Not found',
      code: 'route_not_found',
      path: req.path
    })
  })

  // Error handler (must be last)
  app.use(errorHandler)
}
