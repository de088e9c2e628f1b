/**
 * Hono application assembly.
 *
 * Kept separate from `server.ts` so tests can build the full app around
 * in-memory repositories and a stub session resolver.
 */

import { Hono, type MiddlewareHandler } from 'hono'
import { cors } from 'hono/cors'
import type { Logger } from './lib/logger.js'
import { requestId } from './middleware/auth.js'
import { createCoreApiRoutes } from './routes/core-api.js'
import { fail } from './routes/_api.js'
import { isStudyError } from './services/errors.js'
import type { ReaderStudyService } from './services/reader-study.js'

export type AppDeps = {
  service: ReaderStudyService
  requireAuth: MiddlewareHandler
  logger: Logger
  corsOrigins?: string[]
  /** Better Auth's fetch handler, mounted at `/api/auth/*`. */
  authHandler?: (request: Request) => Promise<Response>
}

export function createApp(deps: AppDeps) {
  const { logger } = deps
  const app = new Hono()

  const origins = deps.corsOrigins ?? []
  app.use('/*', origins.length > 0 ? cors({ origin: origins, credentials: true }) : cors())
  app.use('/*', requestId)

  const authHandler = deps.authHandler
  if (authHandler) {
    app.on(['GET', 'POST'], '/api/auth/*', (c) => authHandler(c.req.raw))
  }

  app.route('/api/v1', createCoreApiRoutes(deps.service, deps.requireAuth))

  app.onError((err, c) => {
    if (isStudyError(err)) {
      return fail(c, err.code, err.message, err.status, err.details)
    }
    logger.error(`${c.req.method} ${c.req.path} failed: ${err.message}`, err)
    return fail(c, 'INTERNAL_ERROR', 'Internal server error.', 500)
  })

  app.notFound((c) => {
    return fail(c, 'NOT_FOUND', 'Route not found.', 404)
  })

  return app
}
