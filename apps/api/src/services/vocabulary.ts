/**
 * Diagnosis vocabulary: turns reader free text into canonical term ids and
 * powers the term picker suggestions.
 */

import type { TermMatch, VocabularyRepository } from './repositories.js'

const SOURCE_ORDER: Record<TermMatch['source'], number> = { name: 0, synonym: 1 }

/**
 * Resolve free text to a term id: exact name first, then exact synonym,
 * both case-insensitive. Unknown or blank text resolves to null.
 */
export async function resolveTerm(
  vocabulary: VocabularyRepository,
  freeText: string | null | undefined,
): Promise<string | null> {
  const text = freeText?.trim()
  if (!text) return null

  const byName = await vocabulary.findTermIdByName(text)
  if (byName) return byName

  return vocabulary.findTermIdBySynonym(text)
}

export async function termExists(vocabulary: VocabularyRepository, termId: string): Promise<boolean> {
  const existing = await vocabulary.listExistingTermIds([termId])
  return existing.has(termId)
}

/** Ids from `termIds` that do not exist, in input order without repeats. */
export async function findUnknownTermIds(
  vocabulary: VocabularyRepository,
  termIds: readonly string[],
): Promise<string[]> {
  const unique = Array.from(new Set(termIds))
  const existing = await vocabulary.listExistingTermIds(unique)
  return unique.filter((id) => !existing.has(id))
}

function matchQuality(match: string, query: string) {
  const normalized = match.toLowerCase()
  if (normalized === query) return 0
  if (normalized.startsWith(query)) return 1
  return 2
}

/**
 * Ranked term suggestions, one per term: exact matches, then prefix, then
 * substring; canonical names beat synonyms at equal quality.
 */
export async function suggestTerms(
  vocabulary: VocabularyRepository,
  query: string,
  limit = 10,
): Promise<TermMatch[]> {
  const normalizedQuery = query.trim().toLowerCase()
  if (!normalizedQuery) return []

  const candidates = await vocabulary.search(normalizedQuery, limit)
  const ranked = candidates
    .map((candidate) => ({ candidate, quality: matchQuality(candidate.match, normalizedQuery) }))
    .sort(
      (a, b) =>
        a.quality - b.quality ||
        SOURCE_ORDER[a.candidate.source] - SOURCE_ORDER[b.candidate.source] ||
        a.candidate.match.localeCompare(b.candidate.match),
    )

  const seen = new Set<string>()
  const suggestions: TermMatch[] = []
  for (const { candidate } of ranked) {
    if (seen.has(candidate.id)) continue
    seen.add(candidate.id)
    suggestions.push(candidate)
    if (suggestions.length >= limit) break
  }
  return suggestions
}
