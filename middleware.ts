import { NextRequest, NextResponse } from 'next/server'

import { basicAuthChallenge, basicCredentials, hasBasicAuth, isOpenPath } from '@/lib/server/access'

// Optional basic auth over every route; off until BASIC_AUTH_USER and BASIC_AUTH_PASSWORD are set.
export function middleware(request: NextRequest) {
  const credentials = basicCredentials()
  if (!credentials || isOpenPath(request.nextUrl.pathname)) {
    return NextResponse.next()
  }

  if (!hasBasicAuth(request.headers.get('authorization'), credentials)) {
    return basicAuthChallenge()
  }
  return NextResponse.next()
}

export const config = {
  matcher: ['/api/:path*'],
}
