import { Router } from 'express'
import type { SessionService } from '../services/sessionService.js'

export function createHealthRouter(sessions: SessionService) {
  const router = Router()

  router.get('/', (_req, res) => {
    return res.json({ success: true, status: 'ok', sessions: sessions.size })
  })

  return router
}
