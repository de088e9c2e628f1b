/**
 * @fileoverview Block finalization tests
 *
 * @description
 * Readiness, accuracy and delta computation, peer averages with and
 * without peers, and exactly-once persistence under concurrent callers.
 */

import { beforeEach, describe, it, expect } from 'vitest'
import { startBlock } from '../assignment-allocator.js'
import { finalizeBlockIfComplete, peerAverages } from '../block-finalizer.js'
import { recomputePeerAverages } from '../peer-averages.js'
import type { StudyRepositories } from '../repositories.js'
import { answer, seedStudy } from './fixtures.js'
import {
  createMemoryRepositories,
  createMemoryStore,
  keepOrder,
  seedCase,
  type MemoryStore,
} from './memory-repositories.js'

const withPlaceholder = { peerAveragePlaceholder: 0.6 }

describe('block-finalizer.ts', () => {
  let store: MemoryStore
  let repos: StudyRepositories

  /** Two-case block: PRE differentials per case, then POST differentials per case. */
  async function playBlock(userId: string, pre: string[][], post: string[][]) {
    const block = await startBlock(repos, { blockSize: 2, random: keepOrder }, userId)
    for (const [index, assignment] of block.entries()) {
      await answer(repos, assignment.id, 'PRE', pre[index] ?? [])
    }
    for (const [index, assignment] of block.entries()) {
      await answer(repos, assignment.id, 'POST', post[index] ?? [])
    }
    return block
  }

  /** PRE: 1/2 top-1, 2/2 top-3. POST: all correct. */
  function playReaderA() {
    return playBlock('user_a', [['Melanoma'], ['Melanoma', 'BCC']], [['Melanoma'], ['BCC']])
  }

  beforeEach(() => {
    store = createMemoryStore()
    seedStudy(store)
    repos = createMemoryRepositories(store)
  })

  it('should return null for a block that does not exist', async () => {
    expect(await finalizeBlockIfComplete(repos, withPlaceholder, 'user_a', 0)).toBeNull()
  })

  it('should return null while an assignment lacks its POST submission', async () => {
    const block = await startBlock(repos, { blockSize: 2, random: keepOrder }, 'user_a')
    await answer(repos, block[0].id, 'PRE', ['Melanoma'])
    await answer(repos, block[0].id, 'POST', ['Melanoma'])

    expect(await finalizeBlockIfComplete(repos, withPlaceholder, 'user_a', 0)).toBeNull()
    expect(store.tables.feedback).toHaveLength(0)
  })

  it('should compute accuracy, deltas and the placeholder peer averages', async () => {
    await playReaderA()

    const feedback = await finalizeBlockIfComplete(repos, withPlaceholder, 'user_a', 0)

    expect(feedback).toMatchObject({
      userId: 'user_a',
      blockIndex: 0,
      top1AccuracyPre: 0.5,
      top1AccuracyPost: 1,
      top3AccuracyPre: 1,
      top3AccuracyPost: 1,
      deltaTop1: 0.5,
      deltaTop3: 0,
      peerAvgTop1Pre: 0.6,
      peerAvgTop1Post: 0.6,
      peerAvgTop3Pre: 0.6,
      peerAvgTop3Post: 0.6,
    })
  })

  it('should store null peer averages when the placeholder is disabled', async () => {
    await playReaderA()

    const feedback = await finalizeBlockIfComplete(repos, { peerAveragePlaceholder: null }, 'user_a', 0)

    expect(feedback?.peerAvgTop1Pre).toBeNull()
    expect(feedback?.peerAvgTop3Post).toBeNull()
  })

  it('should average other readers of the same block index', async () => {
    await playReaderA()
    await finalizeBlockIfComplete(repos, withPlaceholder, 'user_a', 0)
    await playBlock('user_b', [['SCC'], ['SCC']], [['Melanoma'], ['BCC']])

    const feedback = await finalizeBlockIfComplete(repos, withPlaceholder, 'user_b', 0)

    expect(feedback).toMatchObject({
      top1AccuracyPre: 0,
      top3AccuracyPre: 0,
      deltaTop1: 1,
      deltaTop3: 1,
      peerAvgTop1Pre: 0.5,
      peerAvgTop1Post: 1,
      peerAvgTop3Pre: 1,
      peerAvgTop3Post: 1,
    })
  })

  it('should ignore cases without ground truth', async () => {
    store.tables.cases = []
    seedCase(store, 'case_unlabelled', null)
    const [only] = await startBlock(repos, { blockSize: 2, random: keepOrder }, 'user_a')
    await answer(repos, only.id, 'PRE', ['Melanoma'])
    await answer(repos, only.id, 'POST', ['Melanoma'])

    const feedback = await finalizeBlockIfComplete(repos, withPlaceholder, 'user_a', 0)

    expect(feedback).toMatchObject({
      top1AccuracyPre: null,
      top1AccuracyPost: null,
      deltaTop1: null,
      deltaTop3: null,
    })
  })

  it('should persist once and return the stored row on later calls', async () => {
    await playReaderA()

    const first = await finalizeBlockIfComplete(repos, withPlaceholder, 'user_a', 0)
    const second = await finalizeBlockIfComplete(repos, { peerAveragePlaceholder: 0.1 }, 'user_a', 0)

    expect(second?.id).toBe(first?.id)
    expect(second?.peerAvgTop1Pre).toBe(0.6)
    expect(store.tables.feedback).toHaveLength(1)
  })

  it('should produce one row when finalized concurrently', async () => {
    await playReaderA()

    const results = await Promise.all([
      finalizeBlockIfComplete(repos, withPlaceholder, 'user_a', 0),
      finalizeBlockIfComplete(repos, withPlaceholder, 'user_a', 0),
      finalizeBlockIfComplete(repos, withPlaceholder, 'user_a', 0),
    ])

    expect(store.tables.feedback).toHaveLength(1)
    expect(new Set(results.map((row) => row?.id))).toEqual(new Set([store.tables.feedback[0]?.id]))
  })

  describe('peerAverages', () => {
    it('should ignore null peer values', () => {
      const averages = peerAverages(
        [
          {
            id: 'block_feedback_1',
            userId: 'user_x',
            blockIndex: 0,
            top1AccuracyPre: null,
            top1AccuracyPost: 1,
            top3AccuracyPre: 0.5,
            top3AccuracyPost: 1,
            deltaTop1: null,
            deltaTop3: 0.5,
            peerAvgTop1Pre: null,
            peerAvgTop1Post: null,
            peerAvgTop3Pre: null,
            peerAvgTop3Post: null,
            createdAt: new Date('2026-03-01T00:00:00Z'),
          },
        ],
        0.6,
      )

      expect(averages).toEqual({
        peerAvgTop1Pre: null,
        peerAvgTop1Post: 1,
        peerAvgTop3Pre: 0.5,
        peerAvgTop3Post: 1,
      })
    })
  })

  describe('recomputePeerAverages', () => {
    it('should refresh the first reader once a peer has finished the block', async () => {
      await playReaderA()
      await finalizeBlockIfComplete(repos, withPlaceholder, 'user_a', 0)
      await playBlock('user_b', [['SCC'], ['SCC']], [['Melanoma'], ['BCC']])
      await finalizeBlockIfComplete(repos, withPlaceholder, 'user_b', 0)

      const summary = await recomputePeerAverages(repos)

      expect(summary).toEqual({ scanned: 2, updated: 2, withoutPeers: 0 })
      expect(await repos.blockFeedback.find('user_a', 0)).toMatchObject({
        peerAvgTop1Pre: 0,
        peerAvgTop1Post: 1,
        peerAvgTop3Pre: 0,
        peerAvgTop3Post: 1,
      })
    })

    it('should leave rows without peers untouched', async () => {
      await playReaderA()
      await finalizeBlockIfComplete(repos, withPlaceholder, 'user_a', 0)

      const summary = await recomputePeerAverages(repos)

      expect(summary).toEqual({ scanned: 1, updated: 0, withoutPeers: 1 })
      expect((await repos.blockFeedback.find('user_a', 0))?.peerAvgTop1Pre).toBe(0.6)
    })
  })
})
