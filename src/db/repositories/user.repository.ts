import { getDb } from '../index.js';

export interface User {
  id: string;
  username: string;
  email: string;
  password_hash: string;
  created_at: string;
  updated_at: string;
  last_login_at: string | null;
}

export interface CreateUserInput {
  username: string;
  email: string;
  passwordHash: string;
}

export function findUserById(id: string): User | null {
  const db = getDb();
  const stmt = db.prepare('SELECT * FROM users WHERE id = ?');
  return (stmt.get(id) as User | undefined) ?? null;
}

export function findUserByUsername(username: string): User | null {
  const db = getDb();
  return (db.prepare('SELECT * FROM users WHERE username = ?').get(username) as User | undefined) ?? null;
}

export function findUserByEmail(email: string): User | null {
  const db = getDb();
  return (
    (db.prepare('SELECT * FROM users WHERE email = ?').get(email.trim().toLowerCase()) as User | undefined) ??
    null
  );
}

export function createUser(input: CreateUserInput): User {
  const db = getDb();

  const stmt = db.prepare(`
    INSERT INTO users (username, email, password_hash)
    VALUES (?, ?, ?)
    RETURNING *
  `);

  return stmt.get(input.username, input.email.trim().toLowerCase(), input.passwordHash) as User;
}

export function updateLastLogin(id: string): void {
  const db = getDb();
  db.prepare(
    "UPDATE users SET last_login_at = strftime('%Y-%m-%dT%H:%M:%fZ', 'now') WHERE id = ?"
  ).run(id);
}

// ── Revoked refresh tokens ───────────────────────────────────────────────────

export function revokeToken(jti: string, userId: string, expiresAt: Date): void {
  const db = getDb();
  db.prepare(
    'INSERT OR IGNORE INTO revoked_tokens (jti, user_id, expires_at) VALUES (?, ?, ?)'
  ).run(jti, userId, expiresAt.toISOString());
}

export function isTokenRevoked(jti: string): boolean {
  const db = getDb();
  return db.prepare('SELECT 1 FROM revoked_tokens WHERE jti = ?').get(jti) !== undefined;
}

export function cleanupRevokedTokens(): number {
  const db = getDb();
  return db.prepare('DELETE FROM revoked_tokens WHERE expires_at < ?').run(new Date().toISOString()).changes;
}
