/**
 * Chat API
 *
 * One natural-language turn per POST, scoped to a session id
 */

import { Router } from 'express'
import { z } from 'zod'
import type { KeyscoutService } from '../../services/keyscout-service'
import { ApiError } from '../../middleware/error-handler'

const ChatRequestSchema = z.object({
  message: z.string().trim().min(1, 'message is required').max(2000),
  sessionId: z.string().min(1).optional(),
})

export function createChatRouter(service: KeyscoutService) {
  const router = Router()

  // POST /api/v1/chat - Handle one turn; unknown or absent sessionId starts a new session
  router.post('/', async (req, res) => {
    const { message, sessionId } = ChatRequestSchema.parse(req.body)

    const result = await service.chat(message, sessionId)

    res.json(result)
  })

  // GET /api/v1/chat/:sessionId - Transcript
  router.get('/:sessionId', (req, res) => {
    const transcript = service.getTranscript(req.params.sessionId)

    if (!transcript) {
      throw new ApiError(404, `Session not found: ${req.params.sessionId}`, 'session_not_found')
    }

    res.json(transcript)
  })

  // DELETE /api/v1/chat/:sessionId - Clear transcript
  router.delete('/:sessionId', (req, res) => {
    if (!service.clearTranscript(req.params.sessionId)) {
      throw new ApiError(404, `Session not found: ${req.params.sessionId}`, 'session_not_found')
    }

    res.status(204).send()
  })

  return router
}
