import type { Logger } from '../lib/logger.js'
import { peerAverages } from './block-finalizer.js'
import type { BlockFeedback, StudyRepositories } from './repositories.js'

export type RecomputeSummary = {
  scanned: number
  updated: number
  /** Rows left as they are because nobody else has finalized that block index. */
  withoutPeers: number
}

/**
 * Refresh the stored peer averages of every finalized block against the
 * readers who finished the same block index since.
 */
export async function recomputePeerAverages(
  repos: Pick<StudyRepositories, 'blockFeedback'>,
  logger?: Logger,
): Promise<RecomputeSummary> {
  const rows = await repos.blockFeedback.listAll()

  const byBlockIndex = new Map<number, BlockFeedback[]>()
  for (const row of rows) {
    const bucket = byBlockIndex.get(row.blockIndex)
    if (bucket) bucket.push(row)
    else byBlockIndex.set(row.blockIndex, [row])
  }

  const summary: RecomputeSummary = { scanned: rows.length, updated: 0, withoutPeers: 0 }

  for (const row of rows) {
    const peers = (byBlockIndex.get(row.blockIndex) ?? []).filter((peer) => peer.userId !== row.userId)
    if (peers.length === 0) {
      summary.withoutPeers += 1
      continue
    }
    // Placeholder is irrelevant here: peers is non-empty.
    await repos.blockFeedback.updatePeerAverages(row.id, peerAverages(peers, null))
    summary.updated += 1
  }

  logger?.info(`recomputed peer averages`, summary)
  return summary
}
