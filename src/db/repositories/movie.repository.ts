import { z } from 'zod';
import { getDb } from '../index.js';

export interface Movie {
  id: number;
  tmdb_id: number;
  title: string;
  overview: string | null;
  release_date: string | null;
  poster_path: string | null;
  backdrop_path: string | null;
  vote_average: number | null;
  vote_count: number;
  popularity: number | null;
  genre_ids: string; // JSON array of TMDb genre ids
  original_language: string | null;
  created_at: string;
  updated_at: string;
}

export interface UpsertMovieInput {
  tmdbId: number;
  title: string;
  overview: string | null;
  releaseDate: string | null;
  posterPath: string | null;
  backdropPath: string | null;
  voteAverage: number | null;
  voteCount: number;
  popularity: number | null;
  genreIds: number[];
  originalLanguage: string | null;
}

const genreIdsSchema = z.array(z.number().int());

/** Decodes the stored genre id column; a corrupt value reads as no genres. */
export function movieGenreIds(movie: Pick<Movie, 'genre_ids'>): number[] {
  try {
    const parsed = genreIdsSchema.safeParse(JSON.parse(movie.genre_ids));
    return parsed.success ? parsed.data : [];
  } catch {
    return [];
  }
}

const UPSERT_SQL = `
  INSERT INTO movies (
    tmdb_id, title, overview, release_date, poster_path, backdrop_path,
    vote_average, vote_count, popularity, genre_ids, original_language
  ) VALUES (
    @tmdbId, @title, @overview, @releaseDate, @posterPath, @backdropPath,
    @voteAverage, @voteCount, @popularity, @genreIds, @originalLanguage
  )
  ON CONFLICT (tmdb_id) DO UPDATE SET
    title = excluded.title,
    overview = excluded.overview,
    release_date = excluded.release_date,
    poster_path = excluded.poster_path,
    backdrop_path = excluded.backdrop_path,
    vote_average = excluded.vote_average,
    vote_count = excluded.vote_count,
    popularity = excluded.popularity,
    genre_ids = excluded.genre_ids,
    original_language = excluded.original_language,
    updated_at = strftime('%Y-%m-%dT%H:%M:%fZ', 'now')
  RETURNING *
`;

const ORDER_BY_POPULARITY = 'ORDER BY popularity IS NULL, popularity DESC, vote_average DESC, id ASC';

function toParams(input: UpsertMovieInput) {
  return { ...input, genreIds: JSON.stringify(input.genreIds) };
}

export function upsertMovie(input: UpsertMovieInput): Movie {
  const db = getDb();
  return db.prepare(UPSERT_SQL).get(toParams(input)) as Movie;
}

/** Upserts a provider page in one transaction, preserving input order. */
export function upsertMovies(inputs: UpsertMovieInput[]): Movie[] {
  const db = getDb();
  const stmt = db.prepare(UPSERT_SQL);

  return db.transaction((rows: UpsertMovieInput[]) =>
    rows.map((row) => stmt.get(toParams(row)) as Movie)
  )(inputs);
}

export function findMovieByTmdbId(tmdbId: number): Movie | null {
  const db = getDb();
  return (db.prepare('SELECT * FROM movies WHERE tmdb_id = ?').get(tmdbId) as Movie | undefined) ?? null;
}

export function listMovies(limit: number, offset: number): Movie[] {
  const db = getDb();
  return db
    .prepare(`SELECT * FROM movies ${ORDER_BY_POPULARITY} LIMIT ? OFFSET ?`)
    .all(limit, offset) as Movie[];
}

export function countMovies(): number {
  const db = getDb();
  return (db.prepare('SELECT COUNT(*) as count FROM movies').get() as { count: number }).count;
}

export function listPopularMovies(limit: number, excludeIds: number[] = []): Movie[] {
  const db = getDb();
  return db
    .prepare(
      `SELECT * FROM movies
       WHERE id NOT IN (SELECT value FROM json_each(?))
       ${ORDER_BY_POPULARITY}
       LIMIT ?`
    )
    .all(JSON.stringify(excludeIds), limit) as Movie[];
}

/** Movies with at least one genre in `genreIds`, skipping `excludeIds`. */
export function findMoviesSharingGenres(
  genreIds: number[],
  excludeIds: number[],
  limit: number
): Movie[] {
  const db = getDb();
  return db
    .prepare(
      `SELECT * FROM movies
       WHERE id NOT IN (SELECT value FROM json_each(@exclude))
         AND EXISTS (
           SELECT 1 FROM json_each(movies.genre_ids) g
           WHERE g.value IN (SELECT value FROM json_each(@genres))
         )
       ${ORDER_BY_POPULARITY}
       LIMIT @limit`
    )
    .all({
      exclude: JSON.stringify(excludeIds),
      genres: JSON.stringify(genreIds),
      limit,
    }) as Movie[];
}

export function findMoviesByIds(ids: number[]): Movie[] {
  if (ids.length === 0) return [];
  const db = getDb();
  return db
    .prepare('SELECT * FROM movies WHERE id IN (SELECT value FROM json_each(?))')
    .all(JSON.stringify(ids)) as Movie[];
}
