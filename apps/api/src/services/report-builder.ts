/**
 * Report cards.
 *
 * A report card is the block's stored feedback plus one summary per case,
 * in display order, pointing at the reader's PRE and POST assessments.
 */

import type { Assignment, BlockFeedback, StudyRepositories } from './repositories.js'
import { finalizeBlockIfComplete, type FinalizerOptions } from './block-finalizer.js'

export type CaseSummary = {
  assignmentId: string
  caseId: string
  groundTruthDiagnosisId: string | null
  preAssessmentId: string | null
  postAssessmentId: string | null
}

export type ReportCard = BlockFeedback & {
  totalCases: number
  cases: CaseSummary[]
}

export type ReportResult =
  | { status: 'ready'; report: ReportCard }
  | { status: 'not_found'; blockIndex: number; existingBlockIndices: number[] }
  | { status: 'incomplete'; blockIndex: number; remainingCases: number }

export type ReportAvailability = {
  available: boolean
  blockIndex: number
  reason?: string
}

type ReportRepositories = Pick<StudyRepositories, 'assignments' | 'assessments' | 'cases'>

/** Attach per-case summaries to a feedback row. */
export async function assembleReportCard(
  repos: ReportRepositories,
  feedback: BlockFeedback,
  blockAssignments?: Assignment[],
): Promise<ReportCard> {
  const assignments =
    blockAssignments ?? (await repos.assignments.listByBlock(feedback.userId, feedback.blockIndex))
  const ordered = [...assignments].sort((a, b) => a.displayOrder - b.displayOrder)

  const [blockCases, blockAssessments] = await Promise.all([
    repos.cases.listByIds(ordered.map((assignment) => assignment.caseId)),
    repos.assessments.listByAssignments(ordered.map((assignment) => assignment.id)),
  ])
  const groundTruthByCase = new Map(blockCases.map((item) => [item.id, item.groundTruthDiagnosisId]))

  const cases = ordered.map((assignment): CaseSummary => {
    const own = blockAssessments.filter((item) => item.assignmentId === assignment.id)
    return {
      assignmentId: assignment.id,
      caseId: assignment.caseId,
      groundTruthDiagnosisId: groundTruthByCase.get(assignment.caseId) ?? null,
      preAssessmentId: own.find((item) => item.phase === 'PRE')?.id ?? null,
      postAssessmentId: own.find((item) => item.phase === 'POST')?.id ?? null,
    }
  })

  return { ...feedback, totalCases: cases.length, cases }
}

async function existingBlockIndices(repos: ReportRepositories, userId: string) {
  const all = await repos.assignments.listByUser(userId)
  return Array.from(new Set(all.map((assignment) => assignment.blockIndex))).sort((a, b) => a - b)
}

/**
 * Report for one block: `ready` (finalizing on the way if needed),
 * `incomplete` while POST submissions are missing, `not_found` when the
 * reader never had that block.
 */
export async function buildReport(
  repos: StudyRepositories,
  options: FinalizerOptions,
  userId: string,
  blockIndex: number,
): Promise<ReportResult> {
  const assignments = await repos.assignments.listByBlock(userId, blockIndex)
  if (assignments.length === 0) {
    return {
      status: 'not_found',
      blockIndex,
      existingBlockIndices: await existingBlockIndices(repos, userId),
    }
  }

  const remainingCases = assignments.filter((assignment) => assignment.completedPostAt === null).length
  if (remainingCases > 0) {
    return { status: 'incomplete', blockIndex, remainingCases }
  }

  const feedback = await finalizeBlockIfComplete(repos, options, userId, blockIndex)
  if (!feedback) {
    throw new Error(`Block ${blockIndex} for ${userId} is complete but produced no feedback.`)
  }

  return { status: 'ready', report: await assembleReportCard(repos, feedback, assignments) }
}

/** Whether the report for a block can be shown yet. */
export async function reportAvailability(
  repos: StudyRepositories,
  options: FinalizerOptions,
  userId: string,
  blockIndex: number,
): Promise<ReportAvailability> {
  const existing = await repos.blockFeedback.find(userId, blockIndex)
  if (existing) return { available: true, blockIndex }

  const finalized = await finalizeBlockIfComplete(repos, options, userId, blockIndex)
  if (finalized) return { available: true, blockIndex }

  const assignments = await repos.assignments.listByBlock(userId, blockIndex)
  if (assignments.length === 0) {
    return { available: false, blockIndex, reason: 'Block not found' }
  }
  const remaining = assignments.filter((assignment) => assignment.completedPostAt === null).length
  return { available: false, blockIndex, reason: `${remaining} cases pending` }
}

/** Every finalized report card, ascending by block index. */
export async function listReports(
  repos: Pick<StudyRepositories, 'assignments' | 'assessments' | 'cases' | 'blockFeedback'>,
  userId: string,
): Promise<ReportCard[]> {
  const rows = await repos.blockFeedback.listByUser(userId)
  const cards: ReportCard[] = []
  for (const feedback of rows) {
    cards.push(await assembleReportCard(repos, feedback))
  }
  return cards
}

export async function latestReport(
  repos: Pick<StudyRepositories, 'assignments' | 'assessments' | 'cases' | 'blockFeedback'>,
  userId: string,
): Promise<ReportCard | null> {
  const rows = await repos.blockFeedback.listByUser(userId)
  const latest = rows.at(-1)
  if (!latest) return null
  return assembleReportCard(repos, latest)
}
