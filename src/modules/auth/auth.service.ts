import {
  createUser,
  findUserByEmail,
  findUserById,
  findUserByUsername,
  isTokenRevoked,
  revokeToken,
  updateLastLogin,
  type User,
} from '../../db/repositories/user.repository.js';
import { isUniqueViolation } from '../../db/index.js';
import { AppError } from '../../lib/errors.js';
import { issueTokenPair, signAccessToken, verifyUserToken, type TokenPair } from '../../lib/jwt.js';
import { createChildLogger } from '../../lib/logger.js';
import { hashPassword, verifyPassword } from '../../lib/password.js';
import type { LoginBody, RegisterBody } from './auth.schemas.js';

const logger = createChildLogger('auth-service');

/** The identity attached to an authenticated request. */
export interface AuthUser {
  id: string;
  username: string;
}

export interface UserProfile {
  id: string;
  username: string;
  email: string;
  created_at: string;
  last_login_at: string | null;
}

export interface AuthResult extends TokenPair {
  user: UserProfile;
}

// Verified against when the username is unknown so both paths cost one scrypt run.
const DUMMY_HASH_PROMISE = hashPassword('timing-equalizer');

function toProfile(user: User): UserProfile {
  return {
    id: user.id,
    username: user.username,
    email: user.email,
    created_at: user.created_at,
    last_login_at: user.last_login_at,
  };
}

function conflictOn(field: 'username' | 'email'): AppError {
  return new AppError('CONFLICT', `A user with that ${field} already exists`, { field });
}

export async function registerUser(input: RegisterBody): Promise<AuthResult> {
  if (findUserByUsername(input.username)) {
    throw conflictOn('username');
  }
  if (findUserByEmail(input.email)) {
    throw conflictOn('email');
  }

  const passwordHash = await hashPassword(input.password);

  let user: User;
  try {
    user = createUser({ username: input.username, email: input.email, passwordHash });
  } catch (error) {
    // Lost a race with a concurrent registration
    if (isUniqueViolation(error)) {
      throw conflictOn(findUserByUsername(input.username) ? 'username' : 'email');
    }
    throw error;
  }

  logger.info({ userId: user.id }, 'User registered');

  const tokens = await issueTokenPair(user);
  return { user: toProfile(user), ...tokens };
}

export async function loginUser({ username, password }: LoginBody): Promise<AuthResult> {
  const user = findUserByUsername(username);
  const passwordOk = await verifyPassword(password, user?.password_hash ?? (await DUMMY_HASH_PROMISE));

  if (!user || !passwordOk) {
    logger.info({ username }, 'Login failed');
    throw new AppError('INVALID_CREDENTIALS', 'No active account found with the given credentials');
  }

  updateLastLogin(user.id);
  logger.info({ userId: user.id }, 'User logged in');

  const tokens = await issueTokenPair(user);
  const refreshed = findUserById(user.id) ?? user;
  return { user: toProfile(refreshed), ...tokens };
}

/**
 * Resolves a bearer access token to its user.
 * Expired tokens and deleted users raise UNAUTHORIZED; anything else raises INVALID_TOKEN.
 */
export async function authenticateToken(token: string): Promise<AuthUser> {
  const payload = await verifyUserToken(token, 'access');
  const user = findUserById(payload.sub);

  if (!user) {
    throw new AppError('UNAUTHORIZED', 'User not found', { reason: 'user_not_found' });
  }

  return { id: user.id, username: user.username };
}

export async function refreshAccessToken(refreshToken: string): Promise<{ access: string }> {
  const payload = await verifyUserToken(refreshToken, 'refresh');

  if (isTokenRevoked(payload.jti)) {
    throw new AppError('INVALID_TOKEN', 'Token is invalid', { reason: 'token_revoked' });
  }

  const user = findUserById(payload.sub);
  if (!user) {
    throw new AppError('UNAUTHORIZED', 'User not found', { reason: 'user_not_found' });
  }

  return { access: await signAccessToken(user) };
}

export async function logoutUser(user: AuthUser, refreshToken: string): Promise<void> {
  const payload = await verifyUserToken(refreshToken, 'refresh');

  if (payload.sub !== user.id) {
    throw new AppError('INVALID_TOKEN', 'Token is invalid', { reason: 'token_owner_mismatch' });
  }

  revokeToken(payload.jti, user.id, new Date(payload.exp * 1000));
  logger.info({ userId: user.id }, 'Refresh token revoked');
}

export function getProfile(user: AuthUser): UserProfile {
  const row = findUserById(user.id);
  if (!row) {
    throw new AppError('NOT_FOUND', 'User not found');
  }
  return toProfile(row);
}
