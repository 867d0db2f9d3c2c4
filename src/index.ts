import { loadConfig } from './config/index.js'
import { createLifecycleContext } from './context.js'
import { createApp } from './app.js'
import { ApiKeyAccessControl } from './services/accessControl.js'
import { createCacheClient, MetadataCacheService } from './services/metadataCache.service.js'
import { LifecycleEventListener } from './listeners/lifecycleEvents.js'
import { startGrpcServer } from './grpc/server.js'
import type { ClientSource } from './db/repositories/index.js'

const config = loadConfig()

const context = createLifecycleContext({
  timings: config.timings,
  maxBatchSize: config.maxBatchSize,
  accessControl: new ApiKeyAccessControl(config.operatorApiKeys, config.holderApiKeys),
})

const app = createApp(context)

// ── Server Startup ────────────────────────────────────────────────────────────

/**
 * Restores persisted state and starts the listener and gRPC server before
 * HTTP traffic is accepted, so every committed event reaches the mirror.
 */
async function start(): Promise<void> {
  let database: ClientSource | null = null

  // Attempt to initialize DB if URL is provided
  if (config.databaseUrl) {
    const { pool, initDb } = await import('./db/index.js')
    const { loadLifecycleSnapshot } = await import('./db/snapshot.js')
    await initDb()
    const snapshot = await loadLifecycleSnapshot(pool)
    context.restore(snapshot)
    console.log(
      `Restored ${snapshot.tiers.length} tiers and ${snapshot.assets.length} assets; events continue after #${snapshot.lastSequence}.`
    )
    database = pool
  } else {
    console.warn('DATABASE_URL not set; lifecycle events will not be persisted.')
  }

  const listener = new LifecycleEventListener(database, new MetadataCacheService(createCacheClient(config.redisUrl)))
  listener.start(context.eventLog)

  const grpcServer = await startGrpcServer(context, config.grpcPort)

  const httpServer = app.listen(config.port, () => {
    console.log(`Lifecycle API listening on http://localhost:${config.port}`)
  })

  const shutdown = async () => {
    httpServer.close()
    listener.stop()
    grpcServer.forceShutdown()
    await listener.drain()
    process.exit()
  }
  const onSignal = () => {
    shutdown().catch((err: unknown) => {
      console.error('Failed to shut down cleanly:', err)
      process.exit(1)
    })
  }
  process.on('SIGINT', onSignal)
  process.on('SIGTERM', onSignal)
}

if (process.env.NODE_ENV !== 'test') {
  start().catch((err: unknown) => {
    console.error('Failed to start the lifecycle service:', err)
    process.exit(1)
  })
}

export default app
export { app, context }
