/**
 * Analytics API
 */

import { Router } from 'express'
import type { KeyscoutService } from '../../services/keyscout-service'

export function createAnalyticsRouter(service: KeyscoutService) {
  const router = Router()

  // GET /api/v1/analytics/counts - Per-type tally with the chat summary line
  router.get('/counts', async (req, res) => {
    res.json(await service.countByType())
  })

  // GET /api/v1/analytics/breakdown - Paths grouped by type
  router.get('/breakdown', async (req, res) => {
    res.json(await service.breakdownByType())
  })

  return router
}
