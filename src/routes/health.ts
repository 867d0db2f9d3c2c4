import { Router } from 'express'
import type { LifecycleContext } from '../context.js'

export const SERVICE_NAME = 'tier-lifecycle-backend'

export function createHealthRouter(context: LifecycleContext): Router {
  const router = Router()

  router.get('/', (_req, res) => {
    res.json({
      status: 'ok',
      service: SERVICE_NAME,
      now: context.clock.now(),
      tiers: context.lifecycle.listTiers().length,
      assets: context.assets.totalSupply(),
      events: context.eventLog.size,
    })
  })

  return router
}
