// Lấy access token từ request
// Ưu tiên header "Authorization: Bearer <token>", sau đó tới cookie access_token
// (cookie do POST /api/token set, được parse bởi cookie-parser trong main.ts)

import type { Request } from 'express';
import { ExtractJwt } from 'passport-jwt';

export const ACCESS_TOKEN_COOKIE = 'access_token';

const fromAuthHeader = ExtractJwt.fromAuthHeaderAsBearerToken();

function fromCookie(request: Request): string | null {
  const token: unknown = request.cookies?.[ACCESS_TOKEN_COOKIE];
  return typeof token === 'string' && token.length > 0 ? token : null;
}

export function extractAccessToken(request: Request): string | null {
  return fromAuthHeader(request) ?? fromCookie(request);
}
