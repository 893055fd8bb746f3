import { tmdbConfig } from '../../config/index.js';
import { movieGenreIds, type Movie } from '../../db/repositories/movie.repository.js';
import type { Favorite } from '../../db/repositories/favorite.repository.js';

export interface MovieSummary {
  id: number;
  tmdb_id: number;
  title: string;
  overview: string | null;
  release_date: string | null;
  poster_path: string | null;
  backdrop_path: string | null;
  poster_url: string | null;
  backdrop_url: string | null;
  vote_average: number | null;
  vote_count: number;
  popularity: number | null;
  genre_ids: number[];
  original_language: string | null;
  created_at: string;
  updated_at: string;
  is_favorite?: boolean;
}

export interface FavoriteView {
  id: number;
  notes: string | null;
  created_at: string;
  updated_at: string;
  movie: MovieSummary;
}

function imageUrl(path: string | null, size: 'w500' | 'w1280'): string | null {
  return path ? `${tmdbConfig.imageBaseUrl}/${size}${path}` : null;
}

/**
 * `favoriteIds` is only passed for authenticated viewers; anonymous
 * summaries carry no `is_favorite` field at all.
 */
export function toMovieSummary(movie: Movie, favoriteIds?: ReadonlySet<number>): MovieSummary {
  const summary: MovieSummary = {
    id: movie.id,
    tmdb_id: movie.tmdb_id,
    title: movie.title,
    overview: movie.overview,
    release_date: movie.release_date,
    poster_path: movie.poster_path,
    backdrop_path: movie.backdrop_path,
    poster_url: imageUrl(movie.poster_path, 'w500'),
    backdrop_url: imageUrl(movie.backdrop_path, 'w1280'),
    vote_average: movie.vote_average,
    vote_count: movie.vote_count,
    popularity: movie.popularity,
    genre_ids: movieGenreIds(movie),
    original_language: movie.original_language,
    created_at: movie.created_at,
    updated_at: movie.updated_at,
  };

  if (favoriteIds) {
    summary.is_favorite = favoriteIds.has(movie.id);
  }

  return summary;
}

export function toFavoriteView(favorite: Favorite, movie: Movie): FavoriteView {
  return {
    id: favorite.id,
    notes: favorite.notes,
    created_at: favorite.created_at,
    updated_at: favorite.updated_at,
    movie: toMovieSummary(movie),
  };
}
