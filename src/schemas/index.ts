import { z } from 'zod'
import { ethers } from 'ethers'

const positiveId = z.coerce.number().int().positive()

/** Decimal ether amount ("0.069"), parsed to wei. */
export const etherAmountSchema = z
  .string()
  .trim()
  .regex(/^\d+(\.\d{1,18})?$/, 'Expected a decimal ether amount with at most 18 decimals')
  .transform((value) => ethers.parseEther(value))

export const tierParamsSchema = z.object({
  tierId: positiveId,
})

export const assetParamsSchema = z.object({
  assetId: positiveId,
})

export const durationBodySchema = z.object({
  duration: z.number().int().positive(),
})

// range checks belong to the state machine so they surface as IllegalTiming
export const timestampBodySchema = z.object({
  timestamp: z.number().int().nonnegative(),
})

export const feeBodySchema = z.object({
  fee: etherAmountSchema,
})

export const discountBodySchema = z.object({
  bps: z.number().int().nonnegative(),
})

export const mintBodySchema = z.object({
  recipients: z
    .array(
      z.string().refine((value) => ethers.isAddress(value), { message: 'Invalid EVM address' })
    )
    .min(1),
})

export const renewBodySchema = z.object({
  payment: etherAmountSchema,
  discounted: z.boolean().optional(),
})

export const renewBatchBodySchema = z.object({
  assetIds: z.array(z.number().int().positive()).min(1),
  payment: etherAmountSchema,
})

export const eventsQuerySchema = z.object({
  after: z.coerce.number().int().nonnegative().default(0),
  limit: z.coerce.number().int().min(1).max(500).default(100),
})
