import { randomUUID } from 'node:crypto';
import { SignJWT, errors, jwtVerify, type JWTPayload } from 'jose';
import { jwtConfig } from '../config/index.js';
import { AppError } from './errors.js';

export type TokenType = 'access' | 'refresh';

export interface UserTokenPayload extends JWTPayload {
  sub: string; // user.id
  jti: string;
  exp: number;
  username: string;
  type: TokenType;
}

export interface TokenPair {
  access: string;
  refresh: string;
}

function getSecret(): Uint8Array {
  return new TextEncoder().encode(jwtConfig.secret);
}

function parseTtl(ttl: string): number {
  const match = ttl.match(/^(\d+)([smhd])$/);
  if (!match) {
    throw new Error(`Invalid TTL format: ${ttl}`);
  }

  const value = parseInt(match[1] ?? '0', 10);
  const unit = match[2] ?? 's';

  const multipliers: Record<string, number> = {
    s: 1,
    m: 60,
    h: 3600,
    d: 86400,
  };

  return value * (multipliers[unit] ?? 1);
}

async function signUserToken(
  user: { id: string; username: string },
  type: TokenType,
  ttl: string
): Promise<string> {
  const ttlSeconds = parseTtl(ttl);

  return new SignJWT({ username: user.username, type })
    .setProtectedHeader({ alg: 'HS256' })
    .setSubject(user.id)
    .setJti(randomUUID())
    .setIssuedAt()
    .setExpirationTime(Math.floor(Date.now() / 1000) + ttlSeconds)
    .sign(getSecret());
}

export async function issueTokenPair(user: { id: string; username: string }): Promise<TokenPair> {
  const [access, refresh] = await Promise.all([
    signUserToken(user, 'access', jwtConfig.accessTtl),
    signUserToken(user, 'refresh', jwtConfig.refreshTtl),
  ]);
  return { access, refresh };
}

export function signAccessToken(user: { id: string; username: string }): Promise<string> {
  return signUserToken(user, 'access', jwtConfig.accessTtl);
}

function isUserTokenPayload(payload: JWTPayload): payload is UserTokenPayload {
  return (
    typeof payload.sub === 'string' &&
    typeof payload.jti === 'string' &&
    typeof payload.exp === 'number' &&
    typeof payload['username'] === 'string' &&
    (payload['type'] === 'access' || payload['type'] === 'refresh')
  );
}

/**
 * Verifies signature, expiry and token type.
 * Expired tokens raise UNAUTHORIZED; anything else that fails raises INVALID_TOKEN.
 */
export async function verifyUserToken(
  token: string,
  expectedType: TokenType
): Promise<UserTokenPayload> {
  let payload: JWTPayload;

  try {
    ({ payload } = await jwtVerify(token, getSecret(), { algorithms: ['HS256'] }));
  } catch (error) {
    if (error instanceof errors.JWTExpired) {
      throw new AppError('UNAUTHORIZED', 'Token has expired', { reason: 'token_expired' });
    }
    throw new AppError('INVALID_TOKEN', 'Token is invalid', { reason: 'token_not_valid' });
  }

  if (!isUserTokenPayload(payload) || payload.type !== expectedType) {
    throw new AppError('INVALID_TOKEN', 'Token is invalid', { reason: 'wrong_token_type' });
  }

  return payload;
}
