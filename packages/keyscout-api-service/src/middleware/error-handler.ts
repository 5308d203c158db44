/**
 * Error Handler Middleware
 *
 * Maps error kinds onto HTTP statuses. Bodies carry a message and a code,
 * never a stack or an upstream response.
 */

import { Request, Response, NextFunction } from 'express'
import { ZodError } from 'zod'
import { GatewayRejectedError, isKeyscoutError } from 'keyscout'
import type { ErrorKind, KeyscoutError } from 'keyscout'
import { logger } from '../utils/logger'

export class ApiError extends Error {
  constructor(
    public statusCode: number,
    message: string,
    public code?: string
  ) {
    super(message)
    this.name = 'ApiError'
  }
}

export const STATUS_BY_KIND: Record<ErrorKind, number> = {
  not_found: 404,
  access_denied: 403,
  unknown_intent: 400,
  classification_failure: 502,
  upstream_unavailable: 502,
  timeout: 504,
}

const PUBLIC_MESSAGES: Record<ErrorKind, string> = {
  not_found: 'Secret not found',
  access_denied: 'Access denied by the secrets service',
  unknown_intent: 'Request did not map to a supported operation',
  classification_failure: 'Language service unavailable',
  upstream_unavailable: 'Secrets service unavailable',
  timeout: 'Upstream service timed out',
}

function publicMessage(error: KeyscoutError): string {
  if (error.kind === 'not_found') return error.message
  if (error instanceof GatewayRejectedError) return 'Secrets service rejected the request'
  return PUBLIC_MESSAGES[error.kind]
}

function isMalformedBody(error: Error): boolean {
  return error instanceof SyntaxError && 'body' in error
}

export const errorHandler = (
  error: Error,
  req: Request,
  res: Response,
  // Express identifies error handlers by arity
  _next: NextFunction
) => {
  if (error instanceof ApiError) {
    return res.status(error.statusCode).json({
      error: error.message,
      code: error.code ?? 'bad_request'
    })
  }

  if (error instanceof ZodError) {
    return res.status(400).json({
      error: error.issues.map(issue => `${issue.path.join('.') || 'request'}: ${issue.message}`).join('; '),
      code: 'invalid_request'
    })
  }

  if (isMalformedBody(error)) {
    return res.status(400).json({ error: 'Malformed JSON body', code: 'invalid_request' })
  }

  if (isKeyscoutError(error)) {
    const status = STATUS_BY_KIND[error.kind]
    logger.warn('Request failed', { kind: error.kind, reason: error.message, path: req.path, method: req.method })
    return res.status(status).json({
      error: publicMessage(error),
      code: error.kind
    })
  }

  logger.error('Error handling request', {
    error: error.message,
    stack: error.stack,
    path: req.path,
    method: req.method
  })

  // Default to 500 for unexpected errors
  res.status(500).json({
    error: 'Internal server error',
    code: 'internal'
  })
}
