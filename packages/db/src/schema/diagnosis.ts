import { sql } from 'drizzle-orm'
import { index, pgTable, uniqueIndex, varchar } from 'drizzle-orm/pg-core'
import { createdAt, idRef, idWithTag } from './_common'

/**
 * diagnosis_terms
 *
 * Canonical dermatology diagnosis vocabulary. Ground truths, AI predictions
 * and reader entries all point at these rows.
 */
export const diagnosisTerms = pgTable(
  'diagnosis_terms',
  {
    id: idWithTag('term'),

    /** Canonical display name, unique regardless of case. */
    name: varchar('name', { length: 255 }).notNull(),

    createdAt: createdAt(),
  },
  (table) => ({
    diagnosisTermsNameLowerUnique: uniqueIndex('diagnosis_terms_name_lower_unique').on(
      sql`lower(${table.name})`,
    ),
  }),
)

/**
 * diagnosis_synonyms
 *
 * Alternative spellings/abbreviations ("BCC", "basal cell ca") that resolve
 * to one canonical term. A synonym string maps to exactly one term.
 */
export const diagnosisSynonyms = pgTable(
  'diagnosis_synonyms',
  {
    id: idWithTag('synonym'),

    diagnosisTermId: idRef('diagnosis_term_id')
      .references(() => diagnosisTerms.id, { onDelete: 'cascade' })
      .notNull(),

    synonym: varchar('synonym', { length: 255 }).notNull(),

    createdAt: createdAt(),
  },
  (table) => ({
    diagnosisSynonymsLowerUnique: uniqueIndex('diagnosis_synonyms_lower_unique').on(
      sql`lower(${table.synonym})`,
    ),
    diagnosisSynonymsTermIdx: index('diagnosis_synonyms_term_idx').on(table.diagnosisTermId),
  }),
)

export type DiagnosisTerm = typeof diagnosisTerms.$inferSelect
export type DiagnosisSynonym = typeof diagnosisSynonyms.$inferSelect
