import { z } from 'zod'
import { DEFAULT_MAX_BATCH_SIZE, DEFAULT_TIMINGS } from './limits.js'
import type { LifecycleTimings } from '../types/lifecycle.js'

const seconds = (fallback: number) => z.coerce.number().int().nonnegative().default(fallback)

const keyList = z
  .string()
  .default('')
  .transform((value) =>
    value
      .split(',')
      .map((key) => key.trim())
      .filter((key) => key.length > 0)
  )

const envSchema = z.object({
  PORT: z.coerce.number().int().positive().default(3000),
  GRPC_PORT: z.coerce.number().int().positive().default(50051),
  DATABASE_URL: z.string().url().optional(),
  REDIS_URL: z.string().optional(),
  OPERATOR_API_KEYS: keyList,
  HOLDER_API_KEYS: keyList,
  REINIT_WINDOW_SECONDS: seconds(DEFAULT_TIMINGS.reinitWindow),
  EARLY_RENEWAL_WINDOW_SECONDS: seconds(DEFAULT_TIMINGS.earlyRenewalWindow),
  LATE_RENEWAL_WINDOW_SECONDS: seconds(DEFAULT_TIMINGS.lateRenewalWindow),
  MIN_TIER_DURATION_SECONDS: z.coerce.number().int().positive().default(DEFAULT_TIMINGS.minDuration),
  MAX_BATCH_SIZE: z.coerce.number().int().positive().max(500).default(DEFAULT_MAX_BATCH_SIZE),
})

export interface AppConfig {
  port: number
  grpcPort: number
  databaseUrl?: string
  redisUrl?: string
  operatorApiKeys: string[]
  holderApiKeys: string[]
  timings: LifecycleTimings
  maxBatchSize: number
}

/**
 * Reads the service configuration from the environment.
 * Throws a ZodError naming every invalid variable.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.parse(env)

  return {
    port: parsed.PORT,
    grpcPort: parsed.GRPC_PORT,
    databaseUrl: parsed.DATABASE_URL,
    redisUrl: parsed.REDIS_URL,
    operatorApiKeys: parsed.OPERATOR_API_KEYS,
    holderApiKeys: parsed.HOLDER_API_KEYS,
    timings: {
      reinitWindow: parsed.REINIT_WINDOW_SECONDS,
      earlyRenewalWindow: parsed.EARLY_RENEWAL_WINDOW_SECONDS,
      lateRenewalWindow: parsed.LATE_RENEWAL_WINDOW_SECONDS,
      minDuration: parsed.MIN_TIER_DURATION_SECONDS,
    },
    maxBatchSize: parsed.MAX_BATCH_SIZE,
  }
}
