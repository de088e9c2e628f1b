import type { ExtractTablesWithRelations } from 'drizzle-orm'
import { drizzle, type NodePgDatabase, type NodePgQueryResultHKT } from 'drizzle-orm/node-postgres'
import type { PgDatabase } from 'drizzle-orm/pg-core'
import { Pool } from 'pg'

// Common utilities
export * from './schema/_common'
export * from './schema/enums'
export { generateId } from './id'

// Schema exports
export * from './schema/users'
export * from './schema/auth'
export * from './schema/diagnosis'
export * from './schema/cases'
export * from './schema/reader_study'

import * as enumsSchema from './schema/enums'
import * as usersSchema from './schema/users'
import * as authTables from './schema/auth'
import * as diagnosisSchema from './schema/diagnosis'
import * as casesSchema from './schema/cases'
import * as readerStudySchema from './schema/reader_study'

/**
 * Unified Drizzle schema registry, used for `db.query.*` relational reads.
 */
export const schema = {
  ...enumsSchema,
  ...usersSchema,
  ...authTables,
  ...diagnosisSchema,
  ...casesSchema,
  ...readerStudySchema,
}

export type Database = NodePgDatabase<typeof schema>

/**
 * Either the root handle or an open transaction (`db.transaction(async (tx) => ...)`).
 * Repositories accept both.
 */
export type DatabaseExecutor = PgDatabase<
  NodePgQueryResultHKT,
  typeof schema,
  ExtractTablesWithRelations<typeof schema>
>

export type DatabaseHandle = {
  db: Database
  pool: Pool
  checkDatabaseConnection: () => Promise<boolean>
}

/**
 * Open a pooled connection to PostgreSQL.
 *
 * Called once at process start; nothing in this package connects on import.
 */
export function createDatabase(connectionString: string | undefined): DatabaseHandle {
  if (!connectionString) {
    throw new Error('DATABASE_URL is required to initialize @reader-study/db')
  }

  const pool = new Pool({ connectionString })
  const db = drizzle(pool, { schema })

  async function checkDatabaseConnection(): Promise<boolean> {
    const client = await pool.connect()
    try {
      await client.query('SELECT 1')
      return true
    } finally {
      client.release()
    }
  }

  return { db, pool, checkDatabaseConnection }
}
