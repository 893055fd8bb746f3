import { getDb } from '../index.js';

export interface Favorite {
  id: number;
  user_id: string;
  movie_id: number;
  notes: string | null;
  created_at: string;
  updated_at: string;
}

/**
 * Relies on UNIQUE (user_id, movie_id): a duplicate insert raises
 * SQLITE_CONSTRAINT_UNIQUE instead of creating a second row.
 */
export function insertFavorite(userId: string, movieId: number, notes: string | null): Favorite {
  const db = getDb();
  return db
    .prepare('INSERT INTO favorites (user_id, movie_id, notes) VALUES (?, ?, ?) RETURNING *')
    .get(userId, movieId, notes) as Favorite;
}

export function deleteFavorite(userId: string, movieId: number): boolean {
  const db = getDb();
  const result = db
    .prepare('DELETE FROM favorites WHERE user_id = ? AND movie_id = ?')
    .run(userId, movieId);
  return result.changes > 0;
}

export function findFavoriteById(userId: string, favoriteId: number): Favorite | null {
  const db = getDb();
  return (
    (db.prepare('SELECT * FROM favorites WHERE id = ? AND user_id = ?').get(favoriteId, userId) as
      | Favorite
      | undefined) ?? null
  );
}

export function deleteFavoriteById(userId: string, favoriteId: number): boolean {
  const db = getDb();
  return db.prepare('DELETE FROM favorites WHERE id = ? AND user_id = ?').run(favoriteId, userId).changes > 0;
}

export function updateFavoriteNotes(userId: string, movieId: number, notes: string | null): Favorite | null {
  const db = getDb();
  return (
    (db
      .prepare(`
        UPDATE favorites
        SET notes = ?, updated_at = strftime('%Y-%m-%dT%H:%M:%fZ', 'now')
        WHERE user_id = ? AND movie_id = ?
        RETURNING *
      `)
      .get(notes, userId, movieId) as Favorite | undefined) ?? null
  );
}

export function listFavoritesByUser(userId: string, limit: number, offset: number): Favorite[] {
  const db = getDb();
  return db
    .prepare(`
      SELECT * FROM favorites
      WHERE user_id = ?
      ORDER BY created_at DESC, id DESC
      LIMIT ? OFFSET ?
    `)
    .all(userId, limit, offset) as Favorite[];
}

export function countFavoritesByUser(userId: string): number {
  const db = getDb();
  return (
    db.prepare('SELECT COUNT(*) as count FROM favorites WHERE user_id = ?').get(userId) as { count: number }
  ).count;
}

export function listFavoriteMovieIds(userId: string): number[] {
  const db = getDb();
  const rows = db
    .prepare('SELECT movie_id FROM favorites WHERE user_id = ?')
    .all(userId) as Array<{ movie_id: number }>;
  return rows.map((row) => row.movie_id);
}

/** Subset of `movieIds` the user has favorited. */
export function findFavoritedMovieIds(userId: string, movieIds: number[]): Set<number> {
  if (movieIds.length === 0) return new Set();
  const db = getDb();
  const rows = db
    .prepare(`
      SELECT movie_id FROM favorites
      WHERE user_id = ? AND movie_id IN (SELECT value FROM json_each(?))
    `)
    .all(userId, JSON.stringify(movieIds)) as Array<{ movie_id: number }>;
  return new Set(rows.map((row) => row.movie_id));
}
