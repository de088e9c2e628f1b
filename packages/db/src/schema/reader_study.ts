import {
  boolean,
  doublePrecision,
  index,
  integer,
  pgTable,
  smallint,
  text,
  uniqueIndex,
  varchar,
} from 'drizzle-orm/pg-core'
import { createdAt, idRef, idWithTag, markedAt, updatedAt } from './_common'
import { cases } from './cases'
import { diagnosisTerms } from './diagnosis'
import { assessmentPhaseEnum, investigationActionEnum, nextStepActionEnum } from './enums'
import { users } from './users'

/**
 * reader_case_assignments
 *
 * One case placed in one reader's block.
 *
 * Lifecycle:
 * - created by the allocator (`completed_*_at` null),
 * - `completed_pre_at` set by the first PRE submission,
 * - `completed_post_at` set by the first POST submission,
 * - never deleted, never reassigned.
 */
export const readerCaseAssignments = pgTable(
  'reader_case_assignments',
  {
    id: idWithTag('assignment'),

    userId: idRef('user_id')
      .references(() => users.id, { onDelete: 'cascade' })
      .notNull(),

    caseId: idRef('case_id')
      .references(() => cases.id)
      .notNull(),

    /** 0-based block counter per reader. */
    blockIndex: integer('block_index').notNull(),

    /** 0-based position inside the block, in selection order. */
    displayOrder: integer('display_order').notNull(),

    startedAt: markedAt('started_at').defaultNow().notNull(),
    completedPreAt: markedAt('completed_pre_at'),
    completedPostAt: markedAt('completed_post_at'),
  },
  (table) => ({
    /** A case is never shown twice to the same reader. */
    readerCaseAssignmentsUserCaseUnique: uniqueIndex('reader_case_assignments_user_case_unique').on(
      table.userId,
      table.caseId,
    ),
    /** Two concurrent block starts cannot both claim the same slot. */
    readerCaseAssignmentsUserBlockOrderUnique: uniqueIndex(
      'reader_case_assignments_user_block_order_unique',
    ).on(table.userId, table.blockIndex, table.displayOrder),
    readerCaseAssignmentsOpenIdx: index('reader_case_assignments_open_idx').on(
      table.userId,
      table.completedPostAt,
    ),
  }),
)

/**
 * assessments
 *
 * A reader's answer for one assignment in one phase. Resubmission updates
 * this row in place; correctness columns are recomputed every time.
 */
export const assessments = pgTable(
  'assessments',
  {
    id: idWithTag('assessment'),

    assignmentId: idRef('assignment_id')
      .references(() => readerCaseAssignments.id, { onDelete: 'cascade' })
      .notNull(),

    phase: assessmentPhaseEnum('phase').notNull(),

    /** Self-rated confidence, 1 (low) .. 5 (high). */
    diagnosticConfidence: smallint('diagnostic_confidence'),
    managementConfidence: smallint('management_confidence'),

    biopsyRecommended: boolean('biopsy_recommended'),
    referralRecommended: boolean('referral_recommended'),
    investigationAction: investigationActionEnum('investigation_action'),
    nextStepAction: nextStepActionEnum('next_step_action'),

    /** POST only: did seeing the AI change the reader's mind. */
    changedPrimaryDiagnosis: boolean('changed_primary_diagnosis'),
    changedManagementPlan: boolean('changed_management_plan'),
    aiUsefulness: varchar('ai_usefulness', { length: 40 }),

    /** Null when the case has no ground truth. */
    top1Correct: boolean('top1_correct'),
    top3Correct: boolean('top3_correct'),
    rankOfTruth: integer('rank_of_truth'),

    createdAt: createdAt(),
    updatedAt: updatedAt(),
  },
  (table) => ({
    assessmentsAssignmentPhaseUnique: uniqueIndex('assessments_assignment_phase_unique').on(
      table.assignmentId,
      table.phase,
    ),
  }),
)

/**
 * diagnosis_entries
 *
 * Ranked differential for one assessment. `rank` is 1-based and unique per
 * assessment; `diagnosis_term_id` is null when free text did not resolve.
 */
export const diagnosisEntries = pgTable(
  'diagnosis_entries',
  {
    id: idWithTag('diagnosis_entry'),

    assessmentId: idRef('assessment_id')
      .references(() => assessments.id, { onDelete: 'cascade' })
      .notNull(),

    rank: integer('rank').notNull(),

    rawText: text('raw_text'),

    diagnosisTermId: idRef('diagnosis_term_id').references(() => diagnosisTerms.id),
  },
  (table) => ({
    diagnosisEntriesAssessmentRankUnique: uniqueIndex('diagnosis_entries_assessment_rank_unique').on(
      table.assessmentId,
      table.rank,
    ),
  }),
)

/**
 * block_feedback
 *
 * Finalized performance summary for one reader block. Written once; the
 * unique (user, block) index is what makes concurrent finalization safe.
 */
export const blockFeedback = pgTable(
  'block_feedback',
  {
    id: idWithTag('block_feedback'),

    userId: idRef('user_id')
      .references(() => users.id, { onDelete: 'cascade' })
      .notNull(),

    blockIndex: integer('block_index').notNull(),

    top1AccuracyPre: doublePrecision('top1_accuracy_pre'),
    top1AccuracyPost: doublePrecision('top1_accuracy_post'),
    top3AccuracyPre: doublePrecision('top3_accuracy_pre'),
    top3AccuracyPost: doublePrecision('top3_accuracy_post'),
    deltaTop1: doublePrecision('delta_top1'),
    deltaTop3: doublePrecision('delta_top3'),

    /** Mean of other readers' finalized accuracy for the same block index. */
    peerAvgTop1Pre: doublePrecision('peer_avg_top1_pre'),
    peerAvgTop1Post: doublePrecision('peer_avg_top1_post'),
    peerAvgTop3Pre: doublePrecision('peer_avg_top3_pre'),
    peerAvgTop3Post: doublePrecision('peer_avg_top3_post'),

    createdAt: createdAt(),
  },
  (table) => ({
    blockFeedbackUserBlockUnique: uniqueIndex('block_feedback_user_block_unique').on(
      table.userId,
      table.blockIndex,
    ),
    blockFeedbackBlockIdx: index('block_feedback_block_idx').on(table.blockIndex),
  }),
)

export type Assignment = typeof readerCaseAssignments.$inferSelect
export type Assessment = typeof assessments.$inferSelect
export type DiagnosisEntry = typeof diagnosisEntries.$inferSelect
export type BlockFeedback = typeof blockFeedback.$inferSelect
