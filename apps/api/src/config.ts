/**
 * Process configuration.
 *
 * Parsed once at startup from the environment and handed to the services
 * that need it. Nothing reads `process.env` after this.
 */

import { z } from 'zod'

const placeholderSchema = z
  .string()
  .trim()
  .transform((value, ctx) => {
    if (value === '' || value.toLowerCase() === 'none') return null
    const parsed = Number(value)
    if (!Number.isFinite(parsed) || parsed < 0 || parsed > 1) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: 'PEER_AVERAGE_PLACEHOLDER must be a number in [0, 1] or "none".',
      })
      return z.NEVER
    }
    return parsed
  })

const envSchema = z.object({
  DATABASE_URL: z.string().optional(),
  PORT: z.coerce.number().int().positive().default(6129),
  GAME_BLOCK_SIZE: z.coerce.number().int().min(1).default(2),
  PEER_AVERAGE_PLACEHOLDER: placeholderSchema.default('0.6'),
  BETTER_AUTH_SECRET: z.string().optional(),
  BETTER_AUTH_URL: z.string().optional(),
  CORS_ALLOW_ORIGINS: z.string().default(''),
})

export type StudyConfig = {
  /** Cases per block; always >= 1. */
  blockSize: number
  /**
   * Peer average reported while no other reader has finalized the same
   * block index. `null` stores no value.
   */
  peerAveragePlaceholder: number | null
}

export type AppConfig = {
  databaseUrl: string | undefined
  port: number
  study: StudyConfig
  auth: {
    secret: string | undefined
    baseUrl: string | undefined
  }
  corsOrigins: string[]
}

export function loadConfig(env: Record<string, string | undefined> = process.env): AppConfig {
  const parsed = envSchema.safeParse(env)
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    throw new Error(`Invalid configuration:\n${issues.join('\n')}`)
  }

  const values = parsed.data
  return {
    databaseUrl: values.DATABASE_URL,
    port: values.PORT,
    study: {
      blockSize: values.GAME_BLOCK_SIZE,
      peerAveragePlaceholder: values.PEER_AVERAGE_PLACEHOLDER,
    },
    auth: {
      secret: values.BETTER_AUTH_SECRET,
      baseUrl: values.BETTER_AUTH_URL,
    },
    corsOrigins: values.CORS_ALLOW_ORIGINS.split(',')
      .map((origin) => origin.trim())
      .filter(Boolean),
  }
}
