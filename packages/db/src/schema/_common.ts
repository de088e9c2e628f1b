import { text, timestamp } from 'drizzle-orm/pg-core'
import { generateId } from '../id'

/** Row creation timestamp (UTC timestamptz). */
export const createdAt = () => timestamp('created_at', { withTimezone: true }).defaultNow().notNull()

/** Last update timestamp, refreshed by Drizzle on every update. */
export const updatedAt = () =>
  timestamp('updated_at', { withTimezone: true })
    .defaultNow()
    .$onUpdate(() => new Date())
    .notNull()

/** Text FK helper for tagged KSUID ids. */
export const idRef = (name: string) => text(name)

/** Primary key helper using tagged KSUID generation. */
export const idWithTag = (tag = '') => idRef('id').primaryKey().$defaultFn(() => generateId(tag))

/** Nullable timestamptz column, used for lifecycle markers set exactly once. */
export const markedAt = (name: string) => timestamp(name, { withTimezone: true })
