/**
 * Canonical API router, mounted at `/api/v1`.
 *
 * Everything except `/health` requires a signed-in reader.
 */

import { Hono, type MiddlewareHandler } from 'hono'
import type { ReaderStudyService } from '../services/reader-study.js'
import { createAssessmentRoutes } from './assessments.js'
import { createDiagnosisTermRoutes } from './diagnosis-terms.js'
import { createGameRoutes } from './game.js'
import { ok } from './_api.js'

export function createCoreApiRoutes(service: ReaderStudyService, requireAuth: MiddlewareHandler) {
  const coreApiRoutes = new Hono()

  coreApiRoutes.get('/health', (c) => {
    return ok(c, {
      service: 'reader-study-api',
      status: 'healthy',
      version: '0.1.0',
    })
  })

  coreApiRoutes.use('/game/*', requireAuth)
  coreApiRoutes.use('/assessments/*', requireAuth)
  coreApiRoutes.use('/diagnosis-terms/*', requireAuth)

  coreApiRoutes.route('/game', createGameRoutes(service))
  coreApiRoutes.route('/assessments', createAssessmentRoutes(service))
  coreApiRoutes.route('/diagnosis-terms', createDiagnosisTermRoutes(service))

  return coreApiRoutes
}
