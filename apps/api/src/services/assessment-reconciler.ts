/**
 * Assessment reconciliation.
 *
 * One submission = one (assignment, phase) assessment row plus its ranked
 * differential. Resubmitting updates that row and diffs the entries by rank;
 * correctness is recomputed from whatever entries are stored afterwards.
 */

import { NotFoundError, ValidationError } from './errors.js'
import type {
  Assessment,
  AssessmentFields,
  AssessmentPhase,
  DiagnosisEntry,
  DiagnosisEntryValues,
  StudyRepositories,
} from './repositories.js'
import { scoreDiagnosisEntries } from './scoring.js'
import { resolveTerm } from './vocabulary.js'

export type SubmittedDiagnosisEntry = {
  rank: number
  rawText: string | null
  /** Explicit pick from the term list; when null the raw text is resolved. */
  diagnosisTermId: string | null
}

export type AssessmentSubmission = {
  assignmentId: string
  phase: AssessmentPhase
  fields: AssessmentFields
  entries: SubmittedDiagnosisEntry[]
}

export type AssessmentWithEntries = Assessment & {
  diagnosisEntries: DiagnosisEntry[]
}

/**
 * Ranks must be unique and run 1..N with no gaps.
 */
export function validateDiagnosisEntries(entries: readonly SubmittedDiagnosisEntry[]) {
  if (entries.length === 0) {
    throw new ValidationError('NO_DIAGNOSIS_ENTRIES', 'At least one ranked diagnosis is required.')
  }

  const seen = new Set<number>()
  for (const entry of entries) {
    if (seen.has(entry.rank)) {
      throw new ValidationError('DUPLICATE_RANK', `Rank ${entry.rank} appears more than once.`, {
        rank: entry.rank,
      })
    }
    seen.add(entry.rank)
  }

  const ranks = Array.from(seen).sort((a, b) => a - b)
  const contiguous = ranks.every((rank, index) => rank === index + 1)
  if (!contiguous) {
    throw new ValidationError('NON_CONTIGUOUS_RANKS', 'Ranks must run from 1 to N without gaps.', {
      ranks,
    })
  }
}

async function resolveEntries(
  repos: Pick<StudyRepositories, 'vocabulary'>,
  entries: readonly SubmittedDiagnosisEntry[],
): Promise<DiagnosisEntryValues[]> {
  const resolved: DiagnosisEntryValues[] = []
  for (const entry of entries) {
    const rawText = entry.rawText?.trim() || null
    const diagnosisTermId = entry.diagnosisTermId ?? (await resolveTerm(repos.vocabulary, rawText))
    resolved.push({ rank: entry.rank, rawText, diagnosisTermId })
  }
  return resolved
}

/**
 * Update ranks that still exist in place, insert new ranks, delete dropped
 * ranks. Existing rows are never deleted and re-created for the same rank,
 * so the (assessment, rank) unique index is never contended.
 */
async function reconcileEntries(
  repos: Pick<StudyRepositories, 'assessments'>,
  assessmentId: string,
  incoming: readonly DiagnosisEntryValues[],
) {
  const current = await repos.assessments.listEntries(assessmentId)
  const currentByRank = new Map(current.map((entry) => [entry.rank, entry]))
  const incomingRanks = new Set(incoming.map((entry) => entry.rank))

  const toInsert: DiagnosisEntryValues[] = []
  for (const entry of incoming) {
    const existing = currentByRank.get(entry.rank)
    if (!existing) {
      toInsert.push(entry)
      continue
    }
    if (existing.rawText !== entry.rawText || existing.diagnosisTermId !== entry.diagnosisTermId) {
      await repos.assessments.updateEntry(existing.id, {
        rawText: entry.rawText,
        diagnosisTermId: entry.diagnosisTermId,
      })
    }
  }

  await repos.assessments.insertEntries(assessmentId, toInsert)

  const stale = current.filter((entry) => !incomingRanks.has(entry.rank)).map((entry) => entry.id)
  await repos.assessments.deleteEntries(stale)
}

/**
 * Upsert one submission and recompute its correctness.
 *
 * The caller owns the transaction and the business-rule checks (ownership,
 * PRE-before-POST, finalized blocks); this only needs the assignment to exist.
 */
export async function reconcileAssessment(
  repos: StudyRepositories,
  submission: AssessmentSubmission,
  now: Date,
): Promise<AssessmentWithEntries> {
  const assignment = await repos.assignments.getById(submission.assignmentId)
  if (!assignment) {
    throw new NotFoundError('ASSIGNMENT_NOT_FOUND', 'Assignment not found.', {
      assignmentId: submission.assignmentId,
    })
  }

  const readerCase = await repos.cases.getById(assignment.caseId)
  if (!readerCase) {
    throw new NotFoundError('CASE_NOT_FOUND', 'Case for this assignment no longer exists.', {
      caseId: assignment.caseId,
    })
  }

  const existing = await repos.assessments.findByAssignmentPhase(assignment.id, submission.phase)
  const assessment = existing
    ? await repos.assessments.updateFields(existing.id, submission.fields)
    : await repos.assessments.insert({
        assignmentId: assignment.id,
        phase: submission.phase,
        ...submission.fields,
      })

  const entries = await resolveEntries(repos, submission.entries)
  await reconcileEntries(repos, assessment.id, entries)

  // Score the stored entries, not the payload.
  const stored = await repos.assessments.listEntries(assessment.id)
  const correctness = scoreDiagnosisEntries(stored, readerCase.groundTruthDiagnosisId)
  const scored = await repos.assessments.updateFields(assessment.id, correctness)

  await repos.assignments.markPhaseCompleted(assignment.id, submission.phase, now)

  return { ...scored, diagnosisEntries: stored }
}
