/**
 * Repository contracts for the study services.
 *
 * Services depend on these interfaces only. `drizzle-repositories.ts` backs
 * them with PostgreSQL; tests use the in-memory bundle.
 */

import type {
  Assessment,
  AssessmentPhase,
  Assignment,
  BlockFeedback,
  Case,
  DiagnosisEntry,
} from '@reader-study/db'

export type {
  Assessment,
  AssessmentPhase,
  Assignment,
  BlockFeedback,
  Case,
  DiagnosisEntry,
}

export type NewAssignmentInput = Pick<
  Assignment,
  'userId' | 'caseId' | 'blockIndex' | 'displayOrder' | 'startedAt'
>

/** Reader-supplied scalar fields of an assessment. */
export type AssessmentFields = Pick<
  Assessment,
  | 'diagnosticConfidence'
  | 'managementConfidence'
  | 'biopsyRecommended'
  | 'referralRecommended'
  | 'investigationAction'
  | 'nextStepAction'
  | 'changedPrimaryDiagnosis'
  | 'changedManagementPlan'
  | 'aiUsefulness'
>

export type CorrectnessFields = Pick<Assessment, 'top1Correct' | 'top3Correct' | 'rankOfTruth'>

export type DiagnosisEntryValues = Pick<DiagnosisEntry, 'rank' | 'rawText' | 'diagnosisTermId'>

export type PeerAverageFields = Pick<
  BlockFeedback,
  'peerAvgTop1Pre' | 'peerAvgTop1Post' | 'peerAvgTop3Pre' | 'peerAvgTop3Post'
>

export type NewBlockFeedbackInput = Omit<BlockFeedback, 'id' | 'createdAt'>

export type TermMatch = {
  id: string
  name: string
  /** The text that matched: the canonical name or one of its synonyms. */
  match: string
  source: 'name' | 'synonym'
}

export interface CasesRepository {
  getById(caseId: string): Promise<Case | null>
  listByIds(caseIds: string[]): Promise<Case[]>
  /** Cases with no assignment row for this reader, in storage order. */
  listUnassigned(userId: string): Promise<Case[]>
  count(): Promise<number>
}

export interface VocabularyRepository {
  /** Case-insensitive exact match on the canonical name. */
  findTermIdByName(text: string): Promise<string | null>
  /** Case-insensitive exact match on a synonym. */
  findTermIdBySynonym(text: string): Promise<string | null>
  /** Subset of `termIds` that exist. */
  listExistingTermIds(termIds: string[]): Promise<Set<string>>
  /** Names and synonyms containing `query` (case-insensitive). */
  search(query: string, limit: number): Promise<TermMatch[]>
}

export interface AssignmentsRepository {
  getById(assignmentId: string): Promise<Assignment | null>
  /** All of a reader's assignments ordered by block index, then display order. */
  listByUser(userId: string): Promise<Assignment[]>
  listByBlock(userId: string, blockIndex: number): Promise<Assignment[]>
  /** Block index of any assignment still missing its POST submission. */
  findOpenBlockIndex(userId: string): Promise<number | null>
  maxBlockIndex(userId: string): Promise<number | null>
  /** Blocks other allocations for this reader until the surrounding transaction ends. */
  lockReader(userId: string): Promise<void>
  insertMany(rows: NewAssignmentInput[]): Promise<Assignment[]>
  /** Sets the phase's completion timestamp only if it is still null. */
  markPhaseCompleted(assignmentId: string, phase: AssessmentPhase, at: Date): Promise<Assignment>
}

export interface AssessmentsRepository {
  getById(assessmentId: string): Promise<Assessment | null>
  findByAssignmentPhase(assignmentId: string, phase: AssessmentPhase): Promise<Assessment | null>
  listByAssignments(assignmentIds: string[]): Promise<Assessment[]>
  insert(values: { assignmentId: string; phase: AssessmentPhase } & AssessmentFields): Promise<Assessment>
  updateFields(assessmentId: string, values: Partial<AssessmentFields & CorrectnessFields>): Promise<Assessment>
  /** Entries ordered by rank ascending. */
  listEntries(assessmentId: string): Promise<DiagnosisEntry[]>
  listEntriesForAssessments(assessmentIds: string[]): Promise<DiagnosisEntry[]>
  insertEntries(assessmentId: string, entries: DiagnosisEntryValues[]): Promise<void>
  updateEntry(entryId: string, values: Pick<DiagnosisEntry, 'rawText' | 'diagnosisTermId'>): Promise<void>
  deleteEntries(entryIds: string[]): Promise<void>
}

export interface BlockFeedbackRepository {
  find(userId: string, blockIndex: number): Promise<BlockFeedback | null>
  /** A reader's finalized blocks, ascending by block index. */
  listByUser(userId: string): Promise<BlockFeedback[]>
  /** Every other reader's feedback for the same block index. */
  listPeers(blockIndex: number, excludeUserId: string): Promise<BlockFeedback[]>
  listAll(): Promise<BlockFeedback[]>
  /**
   * Insert unless (userId, blockIndex) already exists. Returns `null` when
   * another writer got there first.
   */
  insertIfAbsent(values: NewBlockFeedbackInput): Promise<BlockFeedback | null>
  updatePeerAverages(feedbackId: string, values: PeerAverageFields): Promise<void>
}

export interface StudyRepositories {
  cases: CasesRepository
  vocabulary: VocabularyRepository
  assignments: AssignmentsRepository
  assessments: AssessmentsRepository
  blockFeedback: BlockFeedbackRepository
  /**
   * Run `work` atomically. Repositories handed to `work` see its writes;
   * nothing is visible to others if it throws.
   */
  transaction<T>(work: (repos: StudyRepositories) => Promise<T>): Promise<T>
}
