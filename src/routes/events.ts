import { Router } from 'express'
import type { LifecycleEventLog } from '../services/eventLog.js'
import { eventsQuerySchema } from '../schemas/index.js'

export function createEventsRouter(eventLog: LifecycleEventLog): Router {
  const router = Router()

  router.get('/', (req, res) => {
    const { after, limit } = eventsQuerySchema.parse(req.query)
    const events = eventLog.list(after, limit)
    res.json({
      after,
      limit,
      // bigint fields are written as decimal strings by the app's json replacer
      events,
    })
  })

  return router
}
