import type { Context } from 'hono'
import type { ContentfulStatusCode } from 'hono/utils/http-status'

export function requestMeta(c: Context) {
  return {
    requestId: c.get('requestId') ?? crypto.randomUUID(),
    timestamp: new Date().toISOString(),
  }
}

export function ok<T>(c: Context, data: T, status: ContentfulStatusCode = 200, extra?: Record<string, unknown>) {
  return c.json(
    {
      success: true,
      data,
      meta: requestMeta(c),
      ...(extra ?? {}),
    },
    status,
  )
}

export function fail(
  c: Context,
  code: string,
  message: string,
  status: ContentfulStatusCode = 400,
  details?: unknown,
) {
  return c.json(
    {
      success: false,
      error: {
        code,
        message,
        ...(details !== undefined ? { details } : {}),
      },
      meta: requestMeta(c),
    },
    status,
  )
}

/** Non-negative integer path segment, or null. */
export function parseBlockIndex(value: string | undefined) {
  if (value === undefined || !/^\d+$/.test(value)) return null
  const parsed = Number(value)
  return Number.isSafeInteger(parsed) ? parsed : null
}

export function parsePositiveInt(value: string | undefined, fallback: number) {
  const parsed = Number(value)
  if (!Number.isFinite(parsed) || parsed <= 0) {
    return fallback
  }
  return Math.floor(parsed)
}
