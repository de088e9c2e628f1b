/**
 * Pure scoring helpers shared by the reconciler and the block finalizer.
 */

import type { CorrectnessFields, DiagnosisEntry } from './repositories.js'

type RankedTerm = Pick<DiagnosisEntry, 'rank' | 'diagnosisTermId'>

/** How many leading ranks count toward top-3 correctness. */
export const TOP_K = 3

/**
 * Correctness of one ranked differential against a case's ground truth.
 *
 * Without ground truth all three fields are null. With ground truth they are
 * always set: `false`/`false`/`null` when the truth was never named.
 */
export function scoreDiagnosisEntries(
  entries: readonly RankedTerm[],
  groundTruthDiagnosisId: string | null,
): CorrectnessFields {
  if (groundTruthDiagnosisId === null) {
    return { top1Correct: null, top3Correct: null, rankOfTruth: null }
  }

  const ordered = [...entries].sort((a, b) => a.rank - b.rank)
  const position = ordered.findIndex((entry) => entry.diagnosisTermId === groundTruthDiagnosisId)
  const rankOfTruth = position === -1 ? null : position + 1
  const first = ordered.find((entry) => entry.rank === 1)

  return {
    top1Correct: first?.diagnosisTermId === groundTruthDiagnosisId,
    top3Correct: rankOfTruth !== null && rankOfTruth <= TOP_K,
    rankOfTruth,
  }
}

/** Share of `true` flags; null for an empty list. */
export function accuracy(flags: readonly boolean[]): number | null {
  if (flags.length === 0) return null
  return flags.filter(Boolean).length / flags.length
}

/** `after - before`, or null when either side is unknown. */
export function delta(before: number | null, after: number | null): number | null {
  if (before === null || after === null) return null
  return after - before
}

/** Mean of the non-null values rounded to `digits`; null when none remain. */
export function meanIgnoringNulls(values: readonly (number | null)[], digits = 4): number | null {
  const present = values.filter((value): value is number => value !== null)
  if (present.length === 0) return null
  const mean = present.reduce((sum, value) => sum + value, 0) / present.length
  const factor = 10 ** digits
  return Math.round(mean * factor) / factor
}
