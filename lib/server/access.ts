import { NextResponse } from 'next/server'

/**
 * Request authentication shared by the middleware and the cron-triggered
 * routes. Runs on the edge runtime, so nothing here may touch Node modules.
 */

const REALM = 'ScribeFlow'

/** Routes that skip basic auth; each one checks its own caller or exposes nothing private. */
export const CRON_PATHS = ['/api/recordings/poll'] as const
export const OPEN_PATHS = ['/api/health', ...CRON_PATHS] as const

export interface BasicCredentials {
  user: string
  password: string
}

export function basicCredentials(env: Record<string, string | undefined> = process.env): BasicCredentials | null {
  const user = env.BASIC_AUTH_USER
  const password = env.BASIC_AUTH_PASSWORD
  return user && password ? { user, password } : null
}

export function isOpenPath(pathname: string): boolean {
  return OPEN_PATHS.some(open => pathname === open || pathname.startsWith(`${open}/`))
}

/** True when the `Authorization` header carries exactly these basic credentials. */
export function hasBasicAuth(authorization: string | null, expected: BasicCredentials): boolean {
  if (!authorization) return false

  const [scheme, encoded] = authorization.split(' ')
  if (scheme !== 'Basic' || !encoded) return false

  let decoded: string
  try {
    decoded = globalThis.atob(encoded)
  } catch {
    return false
  }

  const separator = decoded.indexOf(':')
  if (separator === -1) return false
  return decoded.slice(0, separator) === expected.user && decoded.slice(separator + 1) === expected.password
}

/** True when the request presents `Bearer <secret>`; always false while no secret is configured. */
export function hasCronSecret(request: Request, secret: string | undefined): boolean {
  if (!secret) return false
  const token = request.headers.get('authorization')?.replace(/^Bearer /, '')
  return token === secret
}

export function basicAuthChallenge(): NextResponse {
  return new NextResponse('Authentication required', {
    status: 401,
    headers: { 'WWW-Authenticate': `Basic realm="${REALM}", charset="UTF-8"` },
  })
}
