/**
 * API Key Middleware
 *
 * Off unless API_KEY is configured. Mounted under /api/, so paths here are
 * relative to that prefix.
 */

import { timingSafeEqual } from 'crypto'
import type { Request, Response, NextFunction, RequestHandler } from 'express'
import { logger } from '../utils/logger'

const PUBLIC_PATHS = new Set(['/v1/health'])

function keysMatch(expected: string, provided: string): boolean {
  const a = Buffer.from(expected)
  const b = Buffer.from(provided)
  return a.length === b.length && timingSafeEqual(a, b)
}

export function createAuthMiddleware(apiKey: string | undefined): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    if (!apiKey || PUBLIC_PATHS.has(req.path)) {
      return next()
    }

    const provided = req.header('x-api-key')
    if (!provided) {
      res.status(401).json({ error: 'Authentication required', code: 'unauthenticated' })
      return
    }

    if (!keysMatch(apiKey, provided)) {
      logger.warn('Rejected API key', { path: req.originalUrl, ip: req.ip })
      res.status(401).json({ error: 'Invalid API key', code: 'unauthenticated' })
      return
    }

    next()
  }
}
