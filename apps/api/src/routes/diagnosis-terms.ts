import { Hono } from 'hono'
import { z } from 'zod'
import type { ReaderStudyService } from '../services/reader-study.js'
import { fail, ok, parsePositiveInt } from './_api.js'

const suggestQuerySchema = z.object({
  q: z.string().trim().min(1).max(100),
  limit: z.string().optional(),
})

export function createDiagnosisTermRoutes(service: ReaderStudyService) {
  const diagnosisTermRoutes = new Hono()

  diagnosisTermRoutes.get('/suggest', async (c) => {
    const parsed = suggestQuerySchema.safeParse(c.req.query())
    if (!parsed.success) {
      return fail(c, 'VALIDATION_ERROR', 'Invalid query parameters.', 400, parsed.error.flatten())
    }

    const limit = Math.min(parsePositiveInt(parsed.data.limit, 10), 25)
    return ok(c, await service.suggestTerms(parsed.data.q, limit))
  })

  return diagnosisTermRoutes
}
