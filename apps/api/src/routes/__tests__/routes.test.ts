/**
 * @fileoverview HTTP surface tests
 *
 * @description
 * Runs the full Hono app through `app.request()` with in-memory
 * repositories and a stub session resolver keyed on `x-test-user`.
 */

import { beforeEach, describe, it, expect } from 'vitest'
import { createApp } from '../../app.js'
import { silentLogger } from '../../lib/logger.js'
import { createRequireAuth } from '../../middleware/auth.js'
import { createReaderStudyService } from '../../services/reader-study.js'
import type { StudyRepositories } from '../../services/repositories.js'
import {
  createMemoryRepositories,
  createMemoryStore,
  keepOrder,
  seedCase,
  seedTerm,
  type MemoryStore,
} from '../../services/__tests__/memory-repositories.js'

const requireAuth = createRequireAuth(async (headers) => {
  const userId = headers.get('x-test-user')
  if (!userId) return null
  return { user: { id: userId, email: `${userId}@example.test` }, session: { id: `session_${userId}` } }
})

describe('core API routes', () => {
  let store: MemoryStore
  let repos: StudyRepositories
  let app: ReturnType<typeof createApp>

  function call(path: string, init: { method?: string; body?: unknown; user?: string | null } = {}) {
    const headers: Record<string, string> = { 'content-type': 'application/json' }
    if (init.user !== null) headers['x-test-user'] = init.user ?? 'user_a'
    return app.request(path, {
      method: init.method ?? 'GET',
      headers,
      body: init.body === undefined ? undefined : JSON.stringify(init.body),
    })
  }

  async function startedAssignmentId() {
    await call('/api/v1/game/start', { method: 'POST' })
    return store.tables.assignments[0]?.id ?? ''
  }

  beforeEach(() => {
    store = createMemoryStore()
    seedTerm(store, 'term_mel', 'Melanoma', ['MM'])
    seedCase(store, 'case_1', 'term_mel')
    repos = createMemoryRepositories(store)
    const service = createReaderStudyService({
      repos,
      config: { blockSize: 2, peerAveragePlaceholder: 0.6 },
      random: keepOrder,
    })
    app = createApp({ service, requireAuth, logger: silentLogger })
  })

  it('should answer health checks without a session', async () => {
    const res = await call('/api/v1/health', { user: null })

    expect(res.status).toBe(200)
    expect(await res.json()).toMatchObject({ success: true, data: { status: 'healthy' } })
  })

  it('should reject game routes without a session', async () => {
    const res = await call('/api/v1/game/active', { user: null })

    expect(res.status).toBe(401)
    expect(await res.json()).toMatchObject({ success: false, error: { code: 'UNAUTHORIZED' } })
  })

  it('should echo the request id in headers and meta', async () => {
    const res = await app.request('/api/v1/health', { headers: { 'x-request-id': 'req-123' } })

    expect(res.headers.get('x-request-id')).toBe('req-123')
    expect(await res.json()).toMatchObject({ meta: { requestId: 'req-123' } })
  })

  it('should start a block, then refuse when no cases are left', async () => {
    const started = await call('/api/v1/game/start', { method: 'POST' })
    expect(started.status).toBe(200)
    expect(await started.json()).toMatchObject({ success: true, data: { blockIndex: 0 } })

    const other = await call('/api/v1/game/start', { method: 'POST', user: 'user_b' })
    expect(other.status).toBe(200)

    store.tables.cases = []
    const empty = await call('/api/v1/game/start', { method: 'POST', user: 'user_c' })
    expect(empty.status).toBe(400)
    expect(await empty.json()).toMatchObject({ error: { code: 'NO_CASES_AVAILABLE' } })
  })

  it('should report the active block sentinel when nothing is open', async () => {
    const res = await call('/api/v1/game/active')

    expect(await res.json()).toMatchObject({ data: { blockIndex: -1, assignments: [], remaining: 0 } })
  })

  it('should validate assessment payloads', async () => {
    const res = await call('/api/v1/assessments', {
      method: 'POST',
      body: { assignmentId: 'assignment_x', phase: 'LATER', diagnosisEntries: [] },
    })

    expect(res.status).toBe(400)
    expect(await res.json()).toMatchObject({ error: { code: 'VALIDATION_ERROR' } })
  })

  it('should map service rule violations onto 400', async () => {
    const assignmentId = await startedAssignmentId()

    const res = await call('/api/v1/assessments', {
      method: 'POST',
      body: { assignmentId, phase: 'POST', diagnosisEntries: [{ rank: 1, rawText: 'Melanoma' }] },
    })

    expect(res.status).toBe(400)
    expect(await res.json()).toMatchObject({ error: { code: 'PRE_REQUIRED' } })
  })

  it('should accept a PRE submission and expose it to its owner only', async () => {
    const assignmentId = await startedAssignmentId()

    const res = await call('/api/v1/assessments', {
      method: 'POST',
      body: {
        assignmentId,
        phase: 'PRE',
        diagnosticConfidence: 4,
        investigationAction: 'DERMOSCOPY',
        diagnosisEntries: [{ rank: 1, rawText: 'mm' }],
      },
    })
    expect(res.status).toBe(200)
    expect(await res.json()).toMatchObject({
      data: {
        phase: 'PRE',
        diagnosticConfidence: 4,
        investigationAction: 'DERMOSCOPY',
        top1Correct: true,
        blockComplete: false,
        remainingInBlock: 1,
        diagnosisEntries: [{ rank: 1, rawText: 'mm', diagnosisTermId: 'term_mel' }],
      },
    })

    const assessmentId = store.tables.assessments[0]?.id ?? ''
    expect((await call(`/api/v1/assessments/${assessmentId}`)).status).toBe(200)

    const hidden = await call(`/api/v1/assessments/${assessmentId}`, { user: 'user_b' })
    expect(hidden.status).toBe(404)
    expect(await hidden.json()).toMatchObject({ error: { code: 'ASSESSMENT_NOT_FOUND' } })
  })

  it('should map report states onto status codes', async () => {
    await startedAssignmentId()

    const incomplete = await call('/api/v1/game/reports/0')
    expect(incomplete.status).toBe(409)
    expect(await incomplete.json()).toMatchObject({
      error: { code: 'BLOCK_INCOMPLETE', details: { blockIndex: 0, remainingCases: 1 } },
    })

    const missing = await call('/api/v1/game/reports/3')
    expect(missing.status).toBe(404)
    expect(await missing.json()).toMatchObject({ error: { code: 'BLOCK_NOT_FOUND' } })

    expect((await call('/api/v1/game/reports/abc')).status).toBe(400)

    const latest = await call('/api/v1/game/reports/latest')
    expect(latest.status).toBe(404)
    expect(await latest.json()).toMatchObject({ error: { code: 'NO_REPORTS' } })

    const availability = await call('/api/v1/game/reports/0/availability')
    expect(await availability.json()).toMatchObject({
      data: { available: false, blockIndex: 0, reason: '1 cases pending' },
    })
  })

  it('should suggest diagnosis terms', async () => {
    const res = await call('/api/v1/diagnosis-terms/suggest?q=mel')

    expect(await res.json()).toMatchObject({
      data: [{ id: 'term_mel', name: 'Melanoma', match: 'Melanoma', source: 'name' }],
    })
    expect((await call('/api/v1/diagnosis-terms/suggest')).status).toBe(400)
  })

  it('should hide unexpected failures behind INTERNAL_ERROR', async () => {
    repos.cases.count = async () => {
      throw new Error('pool exhausted')
    }

    const res = await call('/api/v1/game/progress')

    expect(res.status).toBe(500)
    expect(await res.json()).toMatchObject({ success: false, error: { code: 'INTERNAL_ERROR' } })
  })

  it('should answer unknown routes with NOT_FOUND', async () => {
    const res = await call('/api/v1/nowhere')

    expect(res.status).toBe(404)
    expect(await res.json()).toMatchObject({ error: { code: 'NOT_FOUND' } })
  })
})
