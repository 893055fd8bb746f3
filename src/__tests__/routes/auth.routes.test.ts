import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { SignJWT } from 'jose';
import { bearer, closeTestApp, createTestApp, registerUser, type TestContext } from '../helpers/app.js';

let ctx: TestContext;

beforeEach(async () => {
  ctx = await createTestApp();
});

afterEach(async () => {
  await closeTestApp(ctx);
});

function expiredAccessToken(userId: string): Promise<string> {
  const now = Math.floor(Date.now() / 1000);
  return new SignJWT({ username: 'alice', type: 'access' })
    .setProtectedHeader({ alg: 'HS256' })
    .setSubject(userId)
    .setJti('expired-token')
    .setIssuedAt(now - 600)
    .setExpirationTime(now - 300)
    .sign(new TextEncoder().encode('test-secret-test-secret-test-secret'));
}

// ---------------------------------------------------------------------------
// Registration and login
// ---------------------------------------------------------------------------

describe('POST /api/v1/auth/register', () => {
  it('creates the user and returns a token pair', async () => {
    const response = await ctx.app.inject({
      method: 'POST',
      url: '/api/v1/auth/register',
      payload: { username: 'alice', email: 'Alice@Example.com', password: 'test-password' },
    });

    expect(response.statusCode).toBe(201);
    const body = response.json();
    expect(body.user).toMatchObject({ username: 'alice', email: 'alice@example.com', last_login_at: null });
    expect(body.user.id).toMatch(/^[0-9a-f]{32}$/);
    expect(typeof body.access).toBe('string');
    expect(typeof body.refresh).toBe('string');
  });

  it('reports which field conflicts', async () => {
    await registerUser(ctx.app, 'alice');

    const sameName = await ctx.app.inject({
      method: 'POST',
      url: '/api/v1/auth/register',
      payload: { username: 'alice', email: 'other@example.com', password: 'test-password' },
    });
    const sameEmail = await ctx.app.inject({
      method: 'POST',
      url: '/api/v1/auth/register',
      payload: { username: 'alice2', email: 'ALICE@example.com', password: 'test-password' },
    });

    expect(sameName.statusCode).toBe(409);
    expect(sameName.json()).toEqual({
      error: { code: 'CONFLICT', message: 'A user with that username already exists', details: { field: 'username' } },
    });
    expect(sameEmail.statusCode).toBe(409);
    expect(sameEmail.json().error.details).toEqual({ field: 'email' });
  });

  it('validates the body', async () => {
    const response = await ctx.app.inject({
      method: 'POST',
      url: '/api/v1/auth/register',
      payload: { username: 'alice', email: 'alice@example.com', password: 'short' },
    });

    expect(response.statusCode).toBe(400);
    expect(response.json()).toEqual({
      error: {
        code: 'VALIDATION_ERROR',
        message: 'Invalid input data',
        details: [{ field: 'password', message: 'Password must be at least 8 characters' }],
      },
    });
  });
});

describe('POST /api/v1/auth/login', () => {
  it('returns tokens and records the login time', async () => {
    await registerUser(ctx.app, 'alice');

    const response = await ctx.app.inject({
      method: 'POST',
      url: '/api/v1/auth/login',
      payload: { username: 'alice', password: 'test-password' },
    });

    expect(response.statusCode).toBe(200);
    const body = response.json();
    expect(body.user.username).toBe('alice');
    expect(body.user.last_login_at).not.toBeNull();
    expect(typeof body.access).toBe('string');
  });

  it('rejects a wrong password and an unknown user the same way', async () => {
    await registerUser(ctx.app, 'alice');

    for (const payload of [
      { username: 'alice', password: 'wrong-password' },
      { username: 'nobody', password: 'test-password' },
    ]) {
      const response = await ctx.app.inject({ method: 'POST', url: '/api/v1/auth/login', payload });
      expect(response.statusCode).toBe(401);
      expect(response.json().error.code).toBe('INVALID_CREDENTIALS');
    }
  });

  it('throttles repeated attempts', async () => {
    const attempt = () =>
      ctx.app.inject({
        method: 'POST',
        url: '/api/v1/auth/login',
        payload: { username: 'nobody', password: 'test-password' },
      });

    for (let i = 0; i < 10; i++) {
      expect((await attempt()).statusCode).toBe(401);
    }

    const throttled = await attempt();
    expect(throttled.statusCode).toBe(429);
    expect(throttled.json().error.code).toBe('TOO_MANY_REQUESTS');
    expect(throttled.headers['retry-after']).toBeDefined();
  });
});

// ---------------------------------------------------------------------------
// Token handling
// ---------------------------------------------------------------------------

describe('GET /api/v1/auth/me', () => {
  it('returns the profile for a valid access token', async () => {
    const user = await registerUser(ctx.app, 'alice');

    const response = await ctx.app.inject({ method: 'GET', url: '/api/v1/auth/me', headers: bearer(user.access) });

    expect(response.statusCode).toBe(200);
    expect(response.json()).toMatchObject({ id: user.id, username: 'alice', email: 'alice@example.com' });
  });

  it('requires credentials', async () => {
    const response = await ctx.app.inject({ method: 'GET', url: '/api/v1/auth/me' });

    expect(response.statusCode).toBe(401);
    expect(response.json().error.code).toBe('UNAUTHORIZED');
  });

  it('answers an expired token with UNAUTHORIZED', async () => {
    const user = await registerUser(ctx.app, 'alice');

    const response = await ctx.app.inject({
      method: 'GET',
      url: '/api/v1/auth/me',
      headers: bearer(await expiredAccessToken(user.id)),
    });

    expect(response.statusCode).toBe(401);
    expect(response.json().error).toEqual({
      code: 'UNAUTHORIZED',
      message: 'Token has expired',
      details: { reason: 'token_expired' },
    });
  });

  it('answers a malformed token with INVALID_TOKEN', async () => {
    const response = await ctx.app.inject({
      method: 'GET',
      url: '/api/v1/auth/me',
      headers: bearer('not-a-jwt'),
    });

    expect(response.statusCode).toBe(401);
    expect(response.json().error.code).toBe('INVALID_TOKEN');
  });

  it('does not accept a refresh token as an access token', async () => {
    const user = await registerUser(ctx.app, 'alice');

    const response = await ctx.app.inject({ method: 'GET', url: '/api/v1/auth/me', headers: bearer(user.refresh) });

    expect(response.statusCode).toBe(401);
    expect(response.json().error).toMatchObject({ code: 'INVALID_TOKEN', details: { reason: 'wrong_token_type' } });
  });
});

describe('refresh and logout', () => {
  it('issues a working access token from a refresh token', async () => {
    const user = await registerUser(ctx.app, 'alice');

    const refreshed = await ctx.app.inject({
      method: 'POST',
      url: '/api/v1/auth/refresh',
      payload: { refresh: user.refresh },
    });
    expect(refreshed.statusCode).toBe(200);

    const me = await ctx.app.inject({
      method: 'GET',
      url: '/api/v1/auth/me',
      headers: bearer(refreshed.json().access),
    });
    expect(me.statusCode).toBe(200);
  });

  it('revokes the refresh token on logout', async () => {
    const user = await registerUser(ctx.app, 'alice');

    const logout = await ctx.app.inject({
      method: 'POST',
      url: '/api/v1/auth/logout',
      headers: bearer(user.access),
      payload: { refresh: user.refresh },
    });
    expect(logout.statusCode).toBe(204);

    const refreshed = await ctx.app.inject({
      method: 'POST',
      url: '/api/v1/auth/refresh',
      payload: { refresh: user.refresh },
    });
    expect(refreshed.statusCode).toBe(401);
    expect(refreshed.json().error).toMatchObject({ code: 'INVALID_TOKEN', details: { reason: 'token_revoked' } });
  });

  it('refuses to revoke another user\'s token', async () => {
    const alice = await registerUser(ctx.app, 'alice');
    const bob = await registerUser(ctx.app, 'bob');

    const response = await ctx.app.inject({
      method: 'POST',
      url: '/api/v1/auth/logout',
      headers: bearer(alice.access),
      payload: { refresh: bob.refresh },
    });

    expect(response.statusCode).toBe(401);
    expect(response.json().error.details).toEqual({ reason: 'token_owner_mismatch' });
  });
});
