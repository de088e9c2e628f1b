/**
 * Authentication middleware for the API.
 *
 * Better Auth is the source of truth for identity and session. Handlers
 * never read the session themselves; they call `getCurrentUser(c)`.
 */

import type { Context, MiddlewareHandler, Next } from 'hono'

/** Small user shape used by the API guard layer. */
export type CurrentUser = {
  id: string
  email?: string
}

/**
 * Looks up the session for a request's headers. In production this is
 * `auth.api.getSession`; tests pass a stub.
 */
export type SessionResolver = (headers: Headers) => Promise<{
  user: { id: string; email: string }
  session: { id: string }
} | null>

declare module 'hono' {
  interface ContextVariableMap {
    requestId: string
    user: CurrentUser
  }
}

/**
 * Ensure each request has a stable request id for tracing.
 */
export async function requestId(c: Context, next: Next) {
  const id = c.req.header('x-request-id') ?? crypto.randomUUID()
  c.set('requestId', id)
  c.header('x-request-id', id)
  await next()
}

/**
 * Require an authenticated user session.
 */
export function createRequireAuth(resolveSession: SessionResolver): MiddlewareHandler {
  return async (c, next) => {
    const session = await resolveSession(c.req.raw.headers)

    if (!session?.user || !session?.session) {
      return c.json(
        {
          success: false,
          error: {
            code: 'UNAUTHORIZED',
            message: 'Authentication required.',
          },
          meta: {
            requestId: c.get('requestId') ?? crypto.randomUUID(),
            timestamp: new Date().toISOString(),
          },
        },
        401,
      )
    }

    c.set('user', { id: String(session.user.id), email: session.user.email })
    await next()
  }
}

export function getCurrentUser(c: Context): CurrentUser | undefined {
  return c.get('user')
}
