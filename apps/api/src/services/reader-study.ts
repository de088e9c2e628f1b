/**
 * Reader study service facade.
 *
 * Routes talk to this object only. Each method is one study operation and
 * owns its transaction boundary; the modules it delegates to take an
 * already-scoped repository bundle.
 */

import type { StudyConfig } from '../config.js'
import { silentLogger, type Logger } from '../lib/logger.js'
import {
  reconcileAssessment,
  validateDiagnosisEntries,
  type AssessmentSubmission,
  type AssessmentWithEntries,
} from './assessment-reconciler.js'
import { getActiveBlock, startBlock } from './assignment-allocator.js'
import { finalizeBlockIfComplete, type FinalizerOptions } from './block-finalizer.js'
import { NotFoundError, ValidationError } from './errors.js'
import { recomputePeerAverages, type RecomputeSummary } from './peer-averages.js'
import { getProgress, type StudyProgress } from './progress.js'
import {
  buildReport,
  latestReport,
  listReports,
  reportAvailability,
  type ReportAvailability,
  type ReportCard,
  type ReportResult,
} from './report-builder.js'
import type { Assignment, BlockFeedback, StudyRepositories, TermMatch } from './repositories.js'
import { findUnknownTermIds, suggestTerms } from './vocabulary.js'

export type ReaderStudyDeps = {
  repos: StudyRepositories
  config: StudyConfig
  logger?: Logger
  /** Shuffle source for block allocation. */
  random?: () => number
  now?: () => Date
}

export type StartedBlock = {
  blockIndex: number | null
  assignments: Assignment[]
}

export type ActiveBlock = {
  /** -1 when the reader has no open block. */
  blockIndex: number
  assignments: Assignment[]
  remaining: number
}

export type NextAssignment =
  | { status: 'continuing' | 'started'; blockIndex: number; assignment: Assignment; remaining: number }
  | { status: 'exhausted'; blockIndex: null; assignment: null; remaining: 0 }

export type SubmissionResult = AssessmentWithEntries & {
  blockIndex: number
  blockComplete: boolean
  remainingInBlock: number
}

function openAssignments(block: readonly Assignment[]) {
  return [...block]
    .sort((a, b) => a.displayOrder - b.displayOrder)
    .filter((assignment) => assignment.completedPostAt === null)
}

export function createReaderStudyService(deps: ReaderStudyDeps) {
  const { repos, config } = deps
  const logger = deps.logger ?? silentLogger
  const now = deps.now ?? (() => new Date())
  const finalizerOptions: FinalizerOptions = {
    peerAveragePlaceholder: config.peerAveragePlaceholder,
    logger,
  }
  const allocatorOptions = { blockSize: config.blockSize, random: deps.random, now }

  async function allocate(userId: string) {
    return repos.transaction((tx) => startBlock(tx, allocatorOptions, userId))
  }

  return {
    async startBlock(userId: string): Promise<StartedBlock> {
      const assignments = await allocate(userId)
      const blockIndex = assignments[0]?.blockIndex ?? null
      if (blockIndex !== null) {
        logger.info(`block ${blockIndex} ready for ${userId}`, { cases: assignments.length })
      }
      return { blockIndex, assignments }
    },

    /** Next unfinished assignment, starting a new block when the last one is done. */
    async nextAssignment(userId: string): Promise<NextAssignment> {
      const active = await getActiveBlock(repos, userId)
      const block = active.length > 0 ? active : await allocate(userId)
      const pending = openAssignments(block)
      const next = pending[0]
      if (!next) {
        return { status: 'exhausted', blockIndex: null, assignment: null, remaining: 0 }
      }
      return {
        status: active.length > 0 ? 'continuing' : 'started',
        blockIndex: next.blockIndex,
        assignment: next,
        remaining: pending.length,
      }
    },

    async getActiveBlock(userId: string): Promise<ActiveBlock> {
      const assignments = await getActiveBlock(repos, userId)
      return {
        blockIndex: assignments[0]?.blockIndex ?? -1,
        assignments,
        remaining: openAssignments(assignments).length,
      }
    },

    getProgress(userId: string): Promise<StudyProgress> {
      return getProgress(repos, userId)
    },

    /**
     * Store a PRE or POST assessment for one of the reader's assignments.
     * A POST that completes the block finalizes it after the write commits.
     */
    async submitAssessment(userId: string, submission: AssessmentSubmission): Promise<SubmissionResult> {
      validateDiagnosisEntries(submission.entries)

      const { assessment, blockIndex } = await repos.transaction(async (tx) => {
        const assignment = await tx.assignments.getById(submission.assignmentId)
        if (!assignment || assignment.userId !== userId) {
          throw new NotFoundError('ASSIGNMENT_NOT_FOUND', 'Assignment not found.', {
            assignmentId: submission.assignmentId,
          })
        }

        if (await tx.blockFeedback.find(userId, assignment.blockIndex)) {
          throw new ValidationError('BLOCK_FINALIZED', 'This block has already been finalized.', {
            blockIndex: assignment.blockIndex,
          })
        }

        if (submission.phase === 'POST') {
          const pre = await tx.assessments.findByAssignmentPhase(assignment.id, 'PRE')
          if (!pre) {
            throw new ValidationError('PRE_REQUIRED', 'Submit the PRE assessment before POST.', {
              assignmentId: assignment.id,
            })
          }
        }

        const explicitTermIds = submission.entries.flatMap((entry) =>
          entry.diagnosisTermId === null ? [] : [entry.diagnosisTermId],
        )
        const unknown = await findUnknownTermIds(tx.vocabulary, explicitTermIds)
        if (unknown.length > 0) {
          throw new ValidationError('UNKNOWN_DIAGNOSIS_TERM', 'Unknown diagnosis term id.', {
            termIds: unknown,
          })
        }

        const stored = await reconcileAssessment(tx, submission, now())
        return { assessment: stored, blockIndex: assignment.blockIndex }
      })

      const block = await repos.assignments.listByBlock(userId, blockIndex)
      const remainingInBlock = openAssignments(block).length
      const blockComplete = remainingInBlock === 0

      if (submission.phase === 'POST' && blockComplete) {
        await finalizeBlockIfComplete(repos, finalizerOptions, userId, blockIndex)
      }

      return { ...assessment, blockIndex, blockComplete, remainingInBlock }
    },

    async getAssessment(userId: string, assessmentId: string): Promise<AssessmentWithEntries> {
      const assessment = await repos.assessments.getById(assessmentId)
      const assignment = assessment ? await repos.assignments.getById(assessment.assignmentId) : null
      if (!assessment || !assignment || assignment.userId !== userId) {
        throw new NotFoundError('ASSESSMENT_NOT_FOUND', 'Assessment not found.', { assessmentId })
      }
      const diagnosisEntries = await repos.assessments.listEntries(assessment.id)
      return { ...assessment, diagnosisEntries }
    },

    finalizeBlock(userId: string, blockIndex: number): Promise<BlockFeedback | null> {
      return finalizeBlockIfComplete(repos, finalizerOptions, userId, blockIndex)
    },

    getReport(userId: string, blockIndex: number): Promise<ReportResult> {
      return buildReport(repos, finalizerOptions, userId, blockIndex)
    },

    getReportAvailability(userId: string, blockIndex: number): Promise<ReportAvailability> {
      return reportAvailability(repos, finalizerOptions, userId, blockIndex)
    },

    listReports(userId: string): Promise<ReportCard[]> {
      return listReports(repos, userId)
    },

    getLatestReport(userId: string): Promise<ReportCard | null> {
      return latestReport(repos, userId)
    },

    suggestTerms(query: string, limit?: number): Promise<TermMatch[]> {
      return suggestTerms(repos.vocabulary, query, limit)
    },

    recomputePeerAverages(): Promise<RecomputeSummary> {
      return recomputePeerAverages(repos, logger)
    },
  }
}

export type ReaderStudyService = ReturnType<typeof createReaderStudyService>
