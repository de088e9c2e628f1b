/**
 * @fileoverview Shared study fixtures for service tests
 */

import { reconcileAssessment } from '../assessment-reconciler.js'
import type { AssessmentFields, AssessmentPhase, StudyRepositories } from '../repositories.js'
import { seedCase, seedTerm, type MemoryStore } from './memory-repositories.js'

export const defaultFields: AssessmentFields = {
  diagnosticConfidence: 3,
  managementConfidence: 3,
  biopsyRecommended: null,
  referralRecommended: null,
  investigationAction: null,
  nextStepAction: null,
  changedPrimaryDiagnosis: null,
  changedManagementPlan: null,
  aiUsefulness: null,
}

/** Three terms and two labelled cases: case_1 is melanoma, case_2 is BCC. */
export function seedStudy(store: MemoryStore) {
  seedTerm(store, 'term_mel', 'Melanoma')
  seedTerm(store, 'term_bcc', 'Basal cell carcinoma', ['BCC'])
  seedTerm(store, 'term_scc', 'Squamous cell carcinoma', ['SCC'])
  seedCase(store, 'case_1', 'term_mel')
  seedCase(store, 'case_2', 'term_bcc')
}

/** Submit a ranked free-text differential, rank 1 first. */
export function answer(
  repos: StudyRepositories,
  assignmentId: string,
  phase: AssessmentPhase,
  differential: string[],
  at = new Date('2026-03-01T10:00:00Z'),
) {
  return reconcileAssessment(
    repos,
    {
      assignmentId,
      phase,
      fields: defaultFields,
      entries: differential.map((rawText, index) => ({ rank: index + 1, rawText, diagnosisTermId: null })),
    },
    at,
  )
}
