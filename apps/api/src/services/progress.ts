import type { StudyRepositories } from './repositories.js'

export type StudyProgress = {
  totalCases: number
  assignedCases: number
  completedCases: number
  /** PRE submitted, POST still missing. */
  inProgressCases: number
  remainingCases: number
  unassignedCases: number
}

export async function getProgress(
  repos: Pick<StudyRepositories, 'assignments' | 'cases'>,
  userId: string,
): Promise<StudyProgress> {
  const [totalCases, assignments] = await Promise.all([
    repos.cases.count(),
    repos.assignments.listByUser(userId),
  ])

  const completedCases = assignments.filter((item) => item.completedPostAt !== null).length
  const inProgressCases = assignments.filter(
    (item) => item.completedPreAt !== null && item.completedPostAt === null,
  ).length

  return {
    totalCases,
    assignedCases: assignments.length,
    completedCases,
    inProgressCases,
    remainingCases: Math.max(totalCases - completedCases, 0),
    unassignedCases: Math.max(totalCases - assignments.length, 0),
  }
}
