import express, { type Express } from 'express'
import type { LifecycleContext } from './context.js'
import { requireApiKey } from './middleware/auth.js'
import { errorHandler, notFoundHandler } from './middleware/errorHandler.js'
import { createHealthRouter } from './routes/health.js'
import { createTiersRouter } from './routes/tiers.js'
import { createAssetsRouter } from './routes/assets.js'
import { createEventsRouter } from './routes/events.js'
import { bigintReplacer } from './utils/json.js'

export function createApp(context: LifecycleContext): Express {
  const app = express()

  app.set('json replacer', bigintReplacer)
  app.use(express.json())

  // ── Health ────────────────────────────────────────────────────────────────────
  app.use('/api/health', createHealthRouter(context))

  // ── Lifecycle API ─────────────────────────────────────────────────────────────
  // Reads are public; every write names its caller through x-api-key.
  const authenticate = requireApiKey(context.accessControl)
  app.use('/api', (req, res, next) => {
    if (req.method === 'GET') {
      next()
      return
    }
    authenticate(req, res, next)
  })

  app.use('/api/tiers', createTiersRouter(context))
  app.use('/api/assets', createAssetsRouter(context))
  app.use('/api/events', createEventsRouter(context.eventLog))

  app.use(notFoundHandler)
  app.use(errorHandler)

  return app
}
