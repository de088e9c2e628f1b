import { index, jsonb, pgTable, varchar } from 'drizzle-orm/pg-core'
import { createdAt, idRef, idWithTag } from './_common'
import { diagnosisTerms } from './diagnosis'

/** AI probability vector: diagnosis term id -> score in [0, 1]. */
export type AiPredictionVector = Record<string, number>

/**
 * cases
 *
 * One dermatology case shown to readers. Ground truth is fixed at import
 * time; the study code only ever reads this table.
 */
export const cases = pgTable(
  'cases',
  {
    id: idWithTag('case'),

    /** Authoritative diagnosis; null for cases without confirmed histology. */
    groundTruthDiagnosisId: idRef('ground_truth_diagnosis_id').references(() => diagnosisTerms.id),

    /** Relative image path, resolved against the media base URL by clients. */
    imageUrl: varchar('image_url', { length: 500 }),

    /** Full AI output, revealed to the reader between PRE and POST. */
    aiPredictions: jsonb('ai_predictions').$type<AiPredictionVector>(),

    createdAt: createdAt(),
  },
  (table) => ({
    casesGroundTruthIdx: index('cases_ground_truth_idx').on(table.groundTruthDiagnosisId),
  }),
)

export type Case = typeof cases.$inferSelect
