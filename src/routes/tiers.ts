import { Router } from 'express'
import type { LifecycleContext } from '../context.js'
import { callerKey } from '../middleware/auth.js'
import {
  discountBodySchema,
  durationBodySchema,
  feeBodySchema,
  mintBodySchema,
  tierParamsSchema,
  timestampBodySchema,
} from '../schemas/index.js'
import { presentFee } from './presenters.js'

export function createTiersRouter(context: LifecycleContext): Router {
  const router = Router()
  const { lifecycle, fees, issuance } = context

  router.get('/', (_req, res) => {
    res.json(lifecycle.listTiers())
  })

  router.get('/:tierId', (req, res) => {
    const { tierId } = tierParamsSchema.parse(req.params)
    res.json(lifecycle.getTier(tierId))
  })

  router.put('/:tierId/duration', (req, res) => {
    const { tierId } = tierParamsSchema.parse(req.params)
    const { duration } = durationBodySchema.parse(req.body)
    res.json(lifecycle.setDuration(callerKey(req), tierId, duration))
  })

  router.put('/:tierId/start', (req, res) => {
    const { tierId } = tierParamsSchema.parse(req.params)
    const { timestamp } = timestampBodySchema.parse(req.body)
    res.json(lifecycle.setStart(callerKey(req), tierId, timestamp))
  })

  router.post('/:tierId/activate', (req, res) => {
    const { tierId } = tierParamsSchema.parse(req.params)
    res.json(lifecycle.activate(callerKey(req), tierId))
  })

  router.post('/:tierId/pause', (req, res) => {
    const { tierId } = tierParamsSchema.parse(req.params)
    const { timestamp } = timestampBodySchema.parse(req.body)
    res.json(lifecycle.pause(callerKey(req), tierId, timestamp))
  })

  router.post('/:tierId/end', (req, res) => {
    const { tierId } = tierParamsSchema.parse(req.params)
    const { timestamp } = timestampBodySchema.parse(req.body)
    res.json(lifecycle.setEnd(callerKey(req), tierId, timestamp))
  })

  router.post('/:tierId/unpause', (req, res) => {
    const { tierId } = tierParamsSchema.parse(req.params)
    res.json(lifecycle.unpause(callerKey(req), tierId))
  })

  router.post('/:tierId/finish', (req, res) => {
    const { tierId } = tierParamsSchema.parse(req.params)
    res.json(lifecycle.finish(callerKey(req), tierId))
  })

  // ── Fees ────────────────────────────────────────────────────────────────────

  router.get('/:tierId/fees', (req, res) => {
    const { tierId } = tierParamsSchema.parse(req.params)
    res.json({
      tierId,
      flat: presentFee(fees.getFee(tierId, 'flat')),
      discount: presentFee(fees.getFee(tierId, 'discount')),
    })
  })

  router.put('/:tierId/fees', (req, res) => {
    const { tierId } = tierParamsSchema.parse(req.params)
    const { fee } = feeBodySchema.parse(req.body)
    res.json({ tierId, variant: 'flat', fee: presentFee(fees.setFee(callerKey(req), tierId, fee)) })
  })

  router.put('/:tierId/fees/discount', (req, res) => {
    const { tierId } = tierParamsSchema.parse(req.params)
    const { bps } = discountBodySchema.parse(req.body)
    res.json({ tierId, variant: 'discount', fee: presentFee(fees.setDiscount(callerKey(req), tierId, bps)) })
  })

  // ── Issuance ────────────────────────────────────────────────────────────────

  router.post('/:tierId/assets', (req, res) => {
    const { tierId } = tierParamsSchema.parse(req.params)
    const { recipients } = mintBodySchema.parse(req.body)
    const assetIds = issuance.mintBatch(callerKey(req), tierId, recipients)
    res.status(201).json({ tierId, assetIds })
  })

  return router
}
