/**
 * PostgreSQL implementation of the study repository contracts.
 *
 * Every repository is bound to one executor: the root `db` handle, or the
 * `tx` of an open transaction. `transaction()` re-binds the whole bundle to
 * a fresh `tx` so services never see the difference.
 */

import { and, asc, count, eq, ilike, inArray, isNull, max, ne, notExists, sql } from 'drizzle-orm'
import {
  assessments,
  blockFeedback,
  cases,
  diagnosisEntries,
  diagnosisSynonyms,
  diagnosisTerms,
  readerCaseAssignments,
  type DatabaseExecutor,
} from '@reader-study/db'
import type {
  AssessmentsRepository,
  AssignmentsRepository,
  BlockFeedbackRepository,
  CasesRepository,
  StudyRepositories,
  TermMatch,
  VocabularyRepository,
} from './repositories.js'

function escapeLikePattern(value: string) {
  return value.replace(/[\\%_]/g, (char) => `\\${char}`)
}

function casesRepository(db: DatabaseExecutor): CasesRepository {
  return {
    async getById(caseId) {
      const [row] = await db.select().from(cases).where(eq(cases.id, caseId)).limit(1)
      return row ?? null
    },

    async listByIds(caseIds) {
      if (caseIds.length === 0) return []
      return db.select().from(cases).where(inArray(cases.id, caseIds))
    },

    async listUnassigned(userId) {
      const assignedToUser = db
        .select({ one: sql`1` })
        .from(readerCaseAssignments)
        .where(and(eq(readerCaseAssignments.caseId, cases.id), eq(readerCaseAssignments.userId, userId)))

      return db
        .select()
        .from(cases)
        .where(notExists(assignedToUser))
        .orderBy(asc(cases.createdAt), asc(cases.id))
    },

    async count() {
      const [row] = await db.select({ value: count() }).from(cases)
      return row?.value ?? 0
    },
  }
}

function vocabularyRepository(db: DatabaseExecutor): VocabularyRepository {
  return {
    async findTermIdByName(text) {
      const [row] = await db
        .select({ id: diagnosisTerms.id })
        .from(diagnosisTerms)
        .where(eq(sql`lower(${diagnosisTerms.name})`, text.trim().toLowerCase()))
        .limit(1)
      return row?.id ?? null
    },

    async findTermIdBySynonym(text) {
      const [row] = await db
        .select({ id: diagnosisSynonyms.diagnosisTermId })
        .from(diagnosisSynonyms)
        .where(eq(sql`lower(${diagnosisSynonyms.synonym})`, text.trim().toLowerCase()))
        .limit(1)
      return row?.id ?? null
    },

    async listExistingTermIds(termIds) {
      if (termIds.length === 0) return new Set<string>()
      const rows = await db
        .select({ id: diagnosisTerms.id })
        .from(diagnosisTerms)
        .where(inArray(diagnosisTerms.id, termIds))
      return new Set(rows.map((row) => row.id))
    },

    async search(query, limit) {
      const needle = query.trim().toLowerCase()
      const pattern = `%${escapeLikePattern(needle)}%`
      const prefix = `${escapeLikePattern(needle)}%`
      // exact, then prefix, then substring; applied before the limit
      const quality = (column: typeof diagnosisTerms.name | typeof diagnosisSynonyms.synonym) =>
        sql<number>`case when lower(${column}) = ${needle} then 0 when lower(${column}) like ${prefix} then 1 else 2 end`

      const [byName, bySynonym] = await Promise.all([
        db
          .select({ id: diagnosisTerms.id, name: diagnosisTerms.name })
          .from(diagnosisTerms)
          .where(ilike(diagnosisTerms.name, pattern))
          .orderBy(asc(quality(diagnosisTerms.name)), asc(diagnosisTerms.name))
          .limit(limit),
        db
          .select({
            id: diagnosisTerms.id,
            name: diagnosisTerms.name,
            synonym: diagnosisSynonyms.synonym,
          })
          .from(diagnosisSynonyms)
          .innerJoin(diagnosisTerms, eq(diagnosisTerms.id, diagnosisSynonyms.diagnosisTermId))
          .where(ilike(diagnosisSynonyms.synonym, pattern))
          .orderBy(asc(quality(diagnosisSynonyms.synonym)), asc(diagnosisSynonyms.synonym))
          .limit(limit),
      ])

      const matches: TermMatch[] = [
        ...byName.map((row): TermMatch => ({ id: row.id, name: row.name, match: row.name, source: 'name' })),
        ...bySynonym.map(
          (row): TermMatch => ({ id: row.id, name: row.name, match: row.synonym, source: 'synonym' }),
        ),
      ]
      return matches
    },
  }
}

function assignmentsRepository(db: DatabaseExecutor): AssignmentsRepository {
  return {
    async getById(assignmentId) {
      const [row] = await db
        .select()
        .from(readerCaseAssignments)
        .where(eq(readerCaseAssignments.id, assignmentId))
        .limit(1)
      return row ?? null
    },

    async listByUser(userId) {
      return db
        .select()
        .from(readerCaseAssignments)
        .where(eq(readerCaseAssignments.userId, userId))
        .orderBy(asc(readerCaseAssignments.blockIndex), asc(readerCaseAssignments.displayOrder))
    },

    async listByBlock(userId, blockIndex) {
      return db
        .select()
        .from(readerCaseAssignments)
        .where(
          and(eq(readerCaseAssignments.userId, userId), eq(readerCaseAssignments.blockIndex, blockIndex)),
        )
        .orderBy(asc(readerCaseAssignments.displayOrder))
    },

    async findOpenBlockIndex(userId) {
      const [row] = await db
        .select({ blockIndex: readerCaseAssignments.blockIndex })
        .from(readerCaseAssignments)
        .where(and(eq(readerCaseAssignments.userId, userId), isNull(readerCaseAssignments.completedPostAt)))
        .orderBy(asc(readerCaseAssignments.blockIndex))
        .limit(1)
      return row?.blockIndex ?? null
    },

    async maxBlockIndex(userId) {
      const [row] = await db
        .select({ value: max(readerCaseAssignments.blockIndex) })
        .from(readerCaseAssignments)
        .where(eq(readerCaseAssignments.userId, userId))
      return row?.value ?? null
    },

    async lockReader(userId) {
      await db.execute(sql`select pg_advisory_xact_lock(hashtext(${userId}))`)
    },

    async insertMany(rows) {
      if (rows.length === 0) return []
      const inserted = await db.insert(readerCaseAssignments).values(rows).returning()
      return inserted.sort((a, b) => a.displayOrder - b.displayOrder)
    },

    async markPhaseCompleted(assignmentId, phase, at) {
      const set =
        phase === 'PRE'
          ? { completedPreAt: sql`coalesce(${readerCaseAssignments.completedPreAt}, ${at})` }
          : { completedPostAt: sql`coalesce(${readerCaseAssignments.completedPostAt}, ${at})` }

      const [row] = await db
        .update(readerCaseAssignments)
        .set(set)
        .where(eq(readerCaseAssignments.id, assignmentId))
        .returning()
      if (!row) {
        throw new Error(`Assignment ${assignmentId} disappeared while marking ${phase} complete.`)
      }
      return row
    },
  }
}

function assessmentsRepository(db: DatabaseExecutor): AssessmentsRepository {
  return {
    async getById(assessmentId) {
      const [row] = await db.select().from(assessments).where(eq(assessments.id, assessmentId)).limit(1)
      return row ?? null
    },

    async findByAssignmentPhase(assignmentId, phase) {
      const [row] = await db
        .select()
        .from(assessments)
        .where(and(eq(assessments.assignmentId, assignmentId), eq(assessments.phase, phase)))
        .limit(1)
      return row ?? null
    },

    async listByAssignments(assignmentIds) {
      if (assignmentIds.length === 0) return []
      return db.select().from(assessments).where(inArray(assessments.assignmentId, assignmentIds))
    },

    async insert(values) {
      const [row] = await db.insert(assessments).values(values).returning()
      if (!row) throw new Error('Assessment insert returned no row.')
      return row
    },

    async updateFields(assessmentId, values) {
      const [row] = await db
        .update(assessments)
        .set(values)
        .where(eq(assessments.id, assessmentId))
        .returning()
      if (!row) throw new Error(`Assessment ${assessmentId} not found for update.`)
      return row
    },

    async listEntries(assessmentId) {
      return db
        .select()
        .from(diagnosisEntries)
        .where(eq(diagnosisEntries.assessmentId, assessmentId))
        .orderBy(asc(diagnosisEntries.rank))
    },

    async listEntriesForAssessments(assessmentIds) {
      if (assessmentIds.length === 0) return []
      return db
        .select()
        .from(diagnosisEntries)
        .where(inArray(diagnosisEntries.assessmentId, assessmentIds))
        .orderBy(asc(diagnosisEntries.assessmentId), asc(diagnosisEntries.rank))
    },

    async insertEntries(assessmentId, entries) {
      if (entries.length === 0) return
      await db.insert(diagnosisEntries).values(entries.map((entry) => ({ ...entry, assessmentId })))
    },

    async updateEntry(entryId, values) {
      await db.update(diagnosisEntries).set(values).where(eq(diagnosisEntries.id, entryId))
    },

    async deleteEntries(entryIds) {
      if (entryIds.length === 0) return
      await db.delete(diagnosisEntries).where(inArray(diagnosisEntries.id, entryIds))
    },
  }
}

function blockFeedbackRepository(db: DatabaseExecutor): BlockFeedbackRepository {
  return {
    async find(userId, blockIndex) {
      const [row] = await db
        .select()
        .from(blockFeedback)
        .where(and(eq(blockFeedback.userId, userId), eq(blockFeedback.blockIndex, blockIndex)))
        .limit(1)
      return row ?? null
    },

    async listByUser(userId) {
      return db
        .select()
        .from(blockFeedback)
        .where(eq(blockFeedback.userId, userId))
        .orderBy(asc(blockFeedback.blockIndex))
    },

    async listPeers(blockIndex, excludeUserId) {
      return db
        .select()
        .from(blockFeedback)
        .where(and(eq(blockFeedback.blockIndex, blockIndex), ne(blockFeedback.userId, excludeUserId)))
    },

    async listAll() {
      return db.select().from(blockFeedback).orderBy(asc(blockFeedback.blockIndex), asc(blockFeedback.createdAt))
    },

    async insertIfAbsent(values) {
      const [row] = await db
        .insert(blockFeedback)
        .values(values)
        .onConflictDoNothing({ target: [blockFeedback.userId, blockFeedback.blockIndex] })
        .returning()
      return row ?? null
    },

    async updatePeerAverages(feedbackId, values) {
      await db.update(blockFeedback).set(values).where(eq(blockFeedback.id, feedbackId))
    },
  }
}

export function createDrizzleRepositories(db: DatabaseExecutor): StudyRepositories {
  return {
    cases: casesRepository(db),
    vocabulary: vocabularyRepository(db),
    assignments: assignmentsRepository(db),
    assessments: assessmentsRepository(db),
    blockFeedback: blockFeedbackRepository(db),
    transaction(work) {
      return db.transaction((tx) => work(createDrizzleRepositories(tx)))
    },
  }
}
