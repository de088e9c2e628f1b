/**
 * Assessment routes (reader-scoped).
 */

import { Hono } from 'hono'
import { z } from 'zod'
import { ASSESSMENT_PHASES, INVESTIGATION_ACTIONS, NEXT_STEP_ACTIONS } from '@reader-study/db'
import { getCurrentUser } from '../middleware/auth.js'
import type { ReaderStudyService } from '../services/reader-study.js'
import { fail, ok } from './_api.js'

const confidenceSchema = z.number().int().min(1).max(5).nullable().default(null)
const flagSchema = z.boolean().nullable().default(null)

const diagnosisEntrySchema = z
  .object({
    rank: z.number().int().min(1),
    rawText: z.string().max(500).nullable().default(null),
    diagnosisTermId: z.string().min(1).nullable().default(null),
  })
  .refine((entry) => Boolean(entry.rawText?.trim()) || entry.diagnosisTermId !== null, {
    message: 'Each diagnosis needs rawText or diagnosisTermId.',
  })

const submitBodySchema = z.object({
  assignmentId: z.string().min(1),
  phase: z.enum(ASSESSMENT_PHASES),
  diagnosticConfidence: confidenceSchema,
  managementConfidence: confidenceSchema,
  biopsyRecommended: flagSchema,
  referralRecommended: flagSchema,
  investigationAction: z.enum(INVESTIGATION_ACTIONS).nullable().default(null),
  nextStepAction: z.enum(NEXT_STEP_ACTIONS).nullable().default(null),
  changedPrimaryDiagnosis: flagSchema,
  changedManagementPlan: flagSchema,
  aiUsefulness: z.string().trim().max(40).nullable().default(null),
  diagnosisEntries: z.array(diagnosisEntrySchema).min(1).max(10),
})

export function createAssessmentRoutes(service: ReaderStudyService) {
  const assessmentRoutes = new Hono()

  assessmentRoutes.post('/', async (c) => {
    const user = getCurrentUser(c)
    if (!user) return fail(c, 'UNAUTHORIZED', 'Authentication required.', 401)

    const body = await c.req.json().catch(() => null)
    const parsed = submitBodySchema.safeParse(body)
    if (!parsed.success) {
      return fail(c, 'VALIDATION_ERROR', 'Invalid assessment payload.', 400, parsed.error.flatten())
    }

    const { assignmentId, phase, diagnosisEntries, ...fields } = parsed.data
    const result = await service.submitAssessment(user.id, {
      assignmentId,
      phase,
      fields,
      entries: diagnosisEntries,
    })
    return ok(c, result)
  })

  assessmentRoutes.get('/:assessmentId', async (c) => {
    const user = getCurrentUser(c)
    if (!user) return fail(c, 'UNAUTHORIZED', 'Authentication required.', 401)

    return ok(c, await service.getAssessment(user.id, c.req.param('assessmentId')))
  })

  return assessmentRoutes
}
