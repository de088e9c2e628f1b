/**
 * Block allocation.
 *
 * A block is a batch of unseen cases for one reader. Within a block the
 * ground-truth diagnoses are kept distinct where the remaining pool allows
 * it; otherwise the block is simply smaller.
 */

import type { Assignment, Case, StudyRepositories } from './repositories.js'

export type AllocatorOptions = {
  blockSize: number
  /** Uniform [0, 1) source used to shuffle the pool. */
  random?: () => number
  now?: () => Date
}

type AllocatorRepositories = Pick<StudyRepositories, 'assignments' | 'cases'>

/** Fisher-Yates shuffle into a new array. */
export function shuffle<T>(items: readonly T[], random: () => number = Math.random): T[] {
  const result = [...items]
  for (let i = result.length - 1; i > 0; i--) {
    const j = Math.floor(random() * (i + 1))
    const held = result[i]
    result[i] = result[j]
    result[j] = held
  }
  return result
}

/**
 * Walk the pool in random order, keeping a case only if its ground truth is
 * not already in the block. Cases without ground truth are always kept.
 */
export function pickBlockCases(
  pool: readonly Case[],
  blockSize: number,
  random: () => number = Math.random,
): Case[] {
  const picked: Case[] = []
  const groundTruths = new Set<string>()

  for (const candidate of shuffle(pool, random)) {
    if (picked.length >= blockSize) break
    const groundTruth = candidate.groundTruthDiagnosisId
    if (groundTruth !== null) {
      if (groundTruths.has(groundTruth)) continue
      groundTruths.add(groundTruth)
    }
    picked.push(candidate)
  }

  return picked
}

/** The reader's open block (any assignment still missing POST), or `[]`. */
export async function getActiveBlock(
  repos: Pick<StudyRepositories, 'assignments'>,
  userId: string,
): Promise<Assignment[]> {
  const blockIndex = await repos.assignments.findOpenBlockIndex(userId)
  if (blockIndex === null) return []
  return repos.assignments.listByBlock(userId, blockIndex)
}

/**
 * Resume the open block, or create the next one.
 *
 * Returns `[]` when every case has already been assigned to this reader.
 * Must run inside a transaction so the pool read and the inserts agree;
 * concurrent calls for one reader queue on the reader lock and resume the
 * block the first one created.
 */
export async function startBlock(
  repos: AllocatorRepositories,
  options: AllocatorOptions,
  userId: string,
): Promise<Assignment[]> {
  await repos.assignments.lockReader(userId)

  const active = await getActiveBlock(repos, userId)
  if (active.length > 0) return active

  const lastBlockIndex = await repos.assignments.maxBlockIndex(userId)
  const blockIndex = lastBlockIndex === null ? 0 : lastBlockIndex + 1

  const pool = await repos.cases.listUnassigned(userId)
  const picked = pickBlockCases(pool, Math.max(1, options.blockSize), options.random)
  if (picked.length === 0) return []

  const startedAt = (options.now ?? (() => new Date()))()
  return repos.assignments.insertMany(
    picked.map((item, displayOrder) => ({
      userId,
      caseId: item.id,
      blockIndex,
      displayOrder,
      startedAt,
    })),
  )
}
