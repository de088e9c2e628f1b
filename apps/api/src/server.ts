import 'dotenv/config'
import { serve } from '@hono/node-server'
import { createDatabase } from '@reader-study/db'
import { createApp } from './app.js'
import { createAuth } from './auth.js'
import { loadConfig } from './config.js'
import { createLogger } from './lib/logger.js'
import { createRequireAuth } from './middleware/auth.js'
import { createDrizzleRepositories } from './services/drizzle-repositories.js'
import { createReaderStudyService } from './services/reader-study.js'

const logger = createLogger('api')
const config = loadConfig()
const { db, checkDatabaseConnection } = createDatabase(config.databaseUrl)
const auth = createAuth(db, config)

const service = createReaderStudyService({
  repos: createDrizzleRepositories(db),
  config: config.study,
  logger: createLogger('game'),
})

const app = createApp({
  service,
  requireAuth: createRequireAuth((headers) => auth.api.getSession({ headers })),
  logger,
  corsOrigins: config.corsOrigins,
  authHandler: auth.handler,
})

checkDatabaseConnection()
  .then(() => logger.info('database connection ok'))
  .catch((error: unknown) => logger.error('database connection failed', error))

serve(
  {
    fetch: app.fetch,
    port: config.port,
  },
  (info) => {
    logger.info(`reader study API http://localhost:${info.port}`, {
      blockSize: config.study.blockSize,
      peerAveragePlaceholder: config.study.peerAveragePlaceholder,
    })
  },
)
