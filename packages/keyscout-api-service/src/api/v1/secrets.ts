/**
 * Secret Browser API
 *
 * Direct façade access for the dashboard's browser tab
 */

import { Router } from 'express'
import { z } from 'zod'
import { SECRET_TYPES } from 'keyscout'
import type { KeyscoutService } from '../../services/keyscout-service'

const typeFilter = z
  .union([z.enum(SECRET_TYPES), z.literal('all')])
  .optional()
  .transform(type => (type === 'all' ? undefined : type))

const ListQuerySchema = z.object({
  pathPrefix: z.string().optional(),
  type: typeFilter,
})

const ValueQuerySchema = z.object({
  path: z.string().trim().min(1, 'path is required'),
  type: typeFilter,
})

const DescribeQuerySchema = z.object({
  path: z.string().trim().min(1, 'path is required'),
})

export function createSecretsRouter(service: KeyscoutService) {
  const router = Router()

  // GET /api/v1/secrets - List, optionally filtered by folder and type
  router.get('/', async (req, res) => {
    const { pathPrefix, type } = ListQuerySchema.parse(req.query)

    const secrets = await service.searchSecrets(pathPrefix, type)

    res.json({ secrets, total: secrets.length })
  })

  // GET /api/v1/secrets/value?path= - Explicit value retrieval
  router.get('/value', async (req, res) => {
    const { path, type } = ValueQuerySchema.parse(req.query)

    const secret = await service.getSecretValue(path, type)

    res.json({ secret })
  })

  // GET /api/v1/secrets/describe?path= - Type and metadata, no value
  router.get('/describe', async (req, res) => {
    const { path } = DescribeQuerySchema.parse(req.query)

    const secret = await service.describeSecret(path)

    res.json({ secret })
  })

  return router
}
