/**
 * Block finalization: turns a POST-complete block into its one
 * `block_feedback` row.
 */

import type { Logger } from '../lib/logger.js'
import type {
  Assessment,
  AssessmentPhase,
  BlockFeedback,
  DiagnosisEntry,
  PeerAverageFields,
  StudyRepositories,
} from './repositories.js'
import { accuracy, delta, meanIgnoringNulls, scoreDiagnosisEntries } from './scoring.js'

export type FinalizerOptions = {
  /** Peer value used while no other reader has finalized this block index. */
  peerAveragePlaceholder: number | null
  logger?: Logger
}

type PhaseAccuracy = { top1: number | null; top3: number | null }

function groupEntries(entries: readonly DiagnosisEntry[]) {
  const byAssessment = new Map<string, DiagnosisEntry[]>()
  for (const entry of entries) {
    const bucket = byAssessment.get(entry.assessmentId)
    if (bucket) bucket.push(entry)
    else byAssessment.set(entry.assessmentId, [entry])
  }
  return byAssessment
}

function phaseAccuracy(
  phase: AssessmentPhase,
  assessments: readonly Assessment[],
  entriesByAssessment: Map<string, DiagnosisEntry[]>,
  groundTruthByAssignment: Map<string, string | null>,
): PhaseAccuracy {
  const top1: boolean[] = []
  const top3: boolean[] = []

  for (const assessment of assessments) {
    if (assessment.phase !== phase) continue
    const groundTruth = groundTruthByAssignment.get(assessment.assignmentId) ?? null
    if (groundTruth === null) continue

    const score = scoreDiagnosisEntries(entriesByAssessment.get(assessment.id) ?? [], groundTruth)
    top1.push(score.top1Correct === true)
    top3.push(score.top3Correct === true)
  }

  return { top1: accuracy(top1), top3: accuracy(top3) }
}

/**
 * Mean of other readers' accuracy for the same block index, or the
 * configured placeholder while there are no peers yet.
 */
export function peerAverages(
  peers: readonly BlockFeedback[],
  placeholder: number | null,
): PeerAverageFields {
  if (peers.length === 0) {
    return {
      peerAvgTop1Pre: placeholder,
      peerAvgTop1Post: placeholder,
      peerAvgTop3Pre: placeholder,
      peerAvgTop3Post: placeholder,
    }
  }

  return {
    peerAvgTop1Pre: meanIgnoringNulls(peers.map((peer) => peer.top1AccuracyPre)),
    peerAvgTop1Post: meanIgnoringNulls(peers.map((peer) => peer.top1AccuracyPost)),
    peerAvgTop3Pre: meanIgnoringNulls(peers.map((peer) => peer.top3AccuracyPre)),
    peerAvgTop3Post: meanIgnoringNulls(peers.map((peer) => peer.top3AccuracyPost)),
  }
}

/**
 * Persist the block's feedback once every assignment has its POST
 * submission; return the stored row.
 *
 * Returns null while the block is missing or still open. Safe to call
 * repeatedly and concurrently: a lost insert race re-reads the winner.
 */
export async function finalizeBlockIfComplete(
  repos: StudyRepositories,
  options: FinalizerOptions,
  userId: string,
  blockIndex: number,
): Promise<BlockFeedback | null> {
  const assignments = await repos.assignments.listByBlock(userId, blockIndex)
  if (assignments.length === 0) return null
  if (assignments.some((assignment) => assignment.completedPostAt === null)) return null

  const existing = await repos.blockFeedback.find(userId, blockIndex)
  if (existing) return existing

  const assignmentIds = assignments.map((assignment) => assignment.id)
  const [assessments, blockCases] = await Promise.all([
    repos.assessments.listByAssignments(assignmentIds),
    repos.cases.listByIds(assignments.map((assignment) => assignment.caseId)),
  ])
  const entries = await repos.assessments.listEntriesForAssessments(assessments.map((item) => item.id))

  const groundTruthByCase = new Map(blockCases.map((item) => [item.id, item.groundTruthDiagnosisId]))
  const groundTruthByAssignment = new Map(
    assignments.map((assignment) => [assignment.id, groundTruthByCase.get(assignment.caseId) ?? null]),
  )
  const entriesByAssessment = groupEntries(entries)

  const pre = phaseAccuracy('PRE', assessments, entriesByAssessment, groundTruthByAssignment)
  const post = phaseAccuracy('POST', assessments, entriesByAssessment, groundTruthByAssignment)
  const peers = await repos.blockFeedback.listPeers(blockIndex, userId)

  const inserted = await repos.blockFeedback.insertIfAbsent({
    userId,
    blockIndex,
    top1AccuracyPre: pre.top1,
    top1AccuracyPost: post.top1,
    top3AccuracyPre: pre.top3,
    top3AccuracyPost: post.top3,
    deltaTop1: delta(pre.top1, post.top1),
    deltaTop3: delta(pre.top3, post.top3),
    ...peerAverages(peers, options.peerAveragePlaceholder),
  })

  if (inserted) {
    options.logger?.info(`finalized block ${blockIndex} for ${userId}`, {
      top1Pre: inserted.top1AccuracyPre,
      top1Post: inserted.top1AccuracyPost,
      peers: peers.length,
    })
    return inserted
  }

  const winner = await repos.blockFeedback.find(userId, blockIndex)
  if (!winner) {
    throw new Error(`Block feedback for ${userId}/${blockIndex} conflicted but could not be re-read.`)
  }
  options.logger?.info(`block ${blockIndex} for ${userId} was finalized concurrently; returning stored row`)
  return winner
}
