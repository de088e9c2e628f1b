import { betterAuth } from 'better-auth'
import { drizzleAdapter } from 'better-auth/adapters/drizzle'
import { authSchema, users, type Database } from '@reader-study/db'
import type { AppConfig } from './config.js'

function normalizeOrigin(origin: string): string {
  return origin.trim().replace(/\/+$/, '')
}

/**
 * Better Auth validates the request `Origin` on state-changing endpoints
 * (sign-out, for example). The reader client and the API itself are
 * trusted by default in local development.
 */
function trustedOrigins(config: AppConfig) {
  return Array.from(
    new Set(
      [
        ...config.corsOrigins,
        config.auth.baseUrl ?? '',
        'http://localhost:5173',
        'http://localhost:6129',
        'http://127.0.0.1:6129',
      ]
        .map((origin) => origin.trim())
        .filter(Boolean)
        .map(normalizeOrigin),
    ),
  )
}

export function createAuth(db: Database, config: AppConfig) {
  return betterAuth({
    database: drizzleAdapter(db, {
      provider: 'pg',
      schema: {
        ...authSchema,
        users,
      },
    }),
    secret: config.auth.secret,
    baseURL: config.auth.baseUrl,
    basePath: '/api/auth',
    trustedOrigins: trustedOrigins(config),
    emailAndPassword: {
      enabled: true,
    },
    user: {
      modelName: 'users',
      fields: {
        image: 'avatarUrl',
      },
    },
    session: {
      modelName: 'sessions',
    },
    account: {
      modelName: 'accounts',
    },
    verification: {
      modelName: 'verifications',
    },
  })
}

export type Auth = ReturnType<typeof createAuth>
