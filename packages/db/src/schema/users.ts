import { boolean, pgTable, text, varchar } from 'drizzle-orm/pg-core'
import { uniqueIndex } from 'drizzle-orm/pg-core'
import { createdAt, idWithTag, updatedAt } from './_common'

/**
 * users
 *
 * Reader identity shared by Better Auth (sign-in, sessions) and the study
 * tables (assignments, block feedback).
 */
export const users = pgTable(
  'users',
  {
    id: idWithTag('user'),

    email: varchar('email', { length: 255 }).notNull(),

    /** Display name shown on report cards. */
    name: varchar('name', { length: 255 }).default('').notNull(),

    /** Mirrors Better Auth verification state. */
    emailVerified: boolean('email_verified').default(false).notNull(),

    avatarUrl: text('avatar_url'),

    /** Optional practice country, collected at registration. */
    country: varchar('country', { length: 80 }),

    createdAt: createdAt(),
    updatedAt: updatedAt(),
  },
  (table) => ({
    usersEmailUnique: uniqueIndex('users_email_unique').on(table.email),
  }),
)

export type User = typeof users.$inferSelect
