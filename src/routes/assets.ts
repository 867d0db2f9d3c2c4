import { Router } from 'express'
import type { LifecycleContext } from '../context.js'
import { callerKey } from '../middleware/auth.js'
import { assetParamsSchema, renewBatchBodySchema, renewBodySchema } from '../schemas/index.js'
import type { RenewalReceipt } from '../services/assetTemporalState.service.js'
import { presentAsset, presentFee } from './presenters.js'

const presentReceipt = (receipt: RenewalReceipt) => ({
  assetId: receipt.assetId,
  feePaid: presentFee(receipt.feePaid),
  window: {
    start: receipt.window.windowStart,
    end: receipt.window.windowEnd,
    status: receipt.window.status,
  },
})

export function createAssetsRouter(context: LifecycleContext): Router {
  const router = Router()
  const { temporalState, assets } = context

  /** Batch renewal; registered ahead of /:assetId so "renew" is not read as an id */
  router.post('/renew', (req, res) => {
    const { assetIds, payment } = renewBatchBodySchema.parse(req.body)
    const receipts = temporalState.renewBatch(callerKey(req), assetIds, payment)
    res.json({ renewals: receipts.map(presentReceipt) })
  })

  router.get('/:assetId', (req, res) => {
    const { assetId } = assetParamsSchema.parse(req.params)
    const snapshot = temporalState.snapshot(assetId)
    res.json(presentAsset(assets.ownerOf(assetId), snapshot))
  })

  router.post('/:assetId/renew', (req, res) => {
    const { assetId } = assetParamsSchema.parse(req.params)
    const { payment, discounted } = renewBodySchema.parse(req.body)
    const receipt = temporalState.renew(callerKey(req), assetId, payment, { discounted })
    res.json(presentReceipt(receipt))
  })

  return router
}
