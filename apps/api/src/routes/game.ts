/**
 * Game routes: block allocation, progress and report cards for the
 * signed-in reader.
 */

import { Hono } from 'hono'
import { getCurrentUser } from '../middleware/auth.js'
import type { ReaderStudyService } from '../services/reader-study.js'
import { fail, ok, parseBlockIndex } from './_api.js'

export function createGameRoutes(service: ReaderStudyService) {
  const gameRoutes = new Hono()

  gameRoutes.post('/start', async (c) => {
    const user = getCurrentUser(c)
    if (!user) return fail(c, 'UNAUTHORIZED', 'Authentication required.', 401)

    const started = await service.startBlock(user.id)
    if (started.blockIndex === null) {
      return fail(c, 'NO_CASES_AVAILABLE', 'Every case has already been assigned to you.', 400)
    }
    return ok(c, started)
  })

  gameRoutes.post('/next', async (c) => {
    const user = getCurrentUser(c)
    if (!user) return fail(c, 'UNAUTHORIZED', 'Authentication required.', 401)
    return ok(c, await service.nextAssignment(user.id))
  })

  gameRoutes.get('/active', async (c) => {
    const user = getCurrentUser(c)
    if (!user) return fail(c, 'UNAUTHORIZED', 'Authentication required.', 401)
    return ok(c, await service.getActiveBlock(user.id))
  })

  gameRoutes.get('/progress', async (c) => {
    const user = getCurrentUser(c)
    if (!user) return fail(c, 'UNAUTHORIZED', 'Authentication required.', 401)
    return ok(c, await service.getProgress(user.id))
  })

  gameRoutes.get('/reports', async (c) => {
    const user = getCurrentUser(c)
    if (!user) return fail(c, 'UNAUTHORIZED', 'Authentication required.', 401)
    return ok(c, await service.listReports(user.id))
  })

  // Registered before `/reports/:blockIndex` so "latest" is not read as an index.
  gameRoutes.get('/reports/latest', async (c) => {
    const user = getCurrentUser(c)
    if (!user) return fail(c, 'UNAUTHORIZED', 'Authentication required.', 401)

    const report = await service.getLatestReport(user.id)
    if (!report) return fail(c, 'NO_REPORTS', 'No reports yet.', 404)
    return ok(c, report)
  })

  gameRoutes.get('/reports/:blockIndex', async (c) => {
    const user = getCurrentUser(c)
    if (!user) return fail(c, 'UNAUTHORIZED', 'Authentication required.', 401)

    const blockIndex = parseBlockIndex(c.req.param('blockIndex'))
    if (blockIndex === null) {
      return fail(c, 'VALIDATION_ERROR', 'blockIndex must be a non-negative integer.', 400)
    }

    const result = await service.getReport(user.id, blockIndex)
    switch (result.status) {
      case 'ready':
        return ok(c, result.report)
      case 'not_found':
        return fail(c, 'BLOCK_NOT_FOUND', `Block ${blockIndex} not found.`, 404, {
          blockIndex,
          existingBlockIndices: result.existingBlockIndices,
        })
      case 'incomplete':
        return fail(c, 'BLOCK_INCOMPLETE', `Block ${blockIndex} still has cases to finish.`, 409, {
          blockIndex,
          remainingCases: result.remainingCases,
        })
    }
  })

  gameRoutes.get('/reports/:blockIndex/availability', async (c) => {
    const user = getCurrentUser(c)
    if (!user) return fail(c, 'UNAUTHORIZED', 'Authentication required.', 401)

    const blockIndex = parseBlockIndex(c.req.param('blockIndex'))
    if (blockIndex === null) {
      return fail(c, 'VALIDATION_ERROR', 'blockIndex must be a non-negative integer.', 400)
    }
    return ok(c, await service.getReportAvailability(user.id, blockIndex))
  })

  return gameRoutes
}
