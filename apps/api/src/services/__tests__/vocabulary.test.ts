/**
 * @fileoverview Diagnosis vocabulary tests
 *
 * @description
 * Free-text resolution, term existence and picker suggestions against the
 * in-memory repositories.
 */

import { beforeEach, describe, it, expect } from 'vitest'
import { findUnknownTermIds, resolveTerm, suggestTerms, termExists } from '../vocabulary.js'
import type { StudyRepositories } from '../repositories.js'
import { createMemoryRepositories, createMemoryStore, seedTerm } from './memory-repositories.js'

describe('vocabulary.ts', () => {
  let repos: StudyRepositories

  beforeEach(() => {
    const store = createMemoryStore()
    seedTerm(store, 'term_mel', 'Melanoma', ['Malignant melanoma', 'MM'])
    seedTerm(store, 'term_bcc', 'Basal cell carcinoma', ['BCC'])
    seedTerm(store, 'term_mel_nevus', 'Melanocytic nevus', ['Mole'])
    repos = createMemoryRepositories(store)
  })

  describe('resolveTerm', () => {
    it('should match canonical names case-insensitively', async () => {
      expect(await resolveTerm(repos.vocabulary, '  melanoma ')).toBe('term_mel')
    })

    it('should fall back to synonyms', async () => {
      expect(await resolveTerm(repos.vocabulary, 'bcc')).toBe('term_bcc')
    })

    it('should return null for unknown or blank text', async () => {
      expect(await resolveTerm(repos.vocabulary, 'Psoriasis')).toBeNull()
      expect(await resolveTerm(repos.vocabulary, '   ')).toBeNull()
      expect(await resolveTerm(repos.vocabulary, null)).toBeNull()
    })
  })

  describe('termExists / findUnknownTermIds', () => {
    it('should report which ids exist', async () => {
      expect(await termExists(repos.vocabulary, 'term_bcc')).toBe(true)
      expect(await termExists(repos.vocabulary, 'term_missing')).toBe(false)
      expect(await findUnknownTermIds(repos.vocabulary, ['term_mel', 'term_x', 'term_x'])).toEqual(['term_x'])
    })
  })

  describe('suggestTerms', () => {
    it('should rank prefix matches before substring matches', async () => {
      const suggestions = await suggestTerms(repos.vocabulary, 'mel')

      expect(suggestions.map((item) => item.id)).toEqual(['term_mel_nevus', 'term_mel'])
      expect(suggestions[0]?.match).toBe('Melanocytic nevus')
    })

    it('should put an exact synonym first and keep one suggestion per term', async () => {
      const suggestions = await suggestTerms(repos.vocabulary, 'mm')

      expect(suggestions).toEqual([{ id: 'term_mel', name: 'Melanoma', match: 'MM', source: 'synonym' }])
    })

    it('should keep an exact match when the limit is smaller than the match count', async () => {
      const store = createMemoryStore()
      seedTerm(store, 'term_acral', 'Acral melanoma')
      seedTerm(store, 'term_amel', 'Amelanotic melanoma')
      seedTerm(store, 'term_mel', 'Melanoma')

      const suggestions = await suggestTerms(createMemoryRepositories(store).vocabulary, 'melanoma', 2)

      expect(suggestions.map((item) => item.name)).toEqual(['Melanoma', 'Acral melanoma'])
    })

    it('should return nothing for a blank query', async () => {
      expect(await suggestTerms(repos.vocabulary, '  ')).toEqual([])
    })
  })
})
