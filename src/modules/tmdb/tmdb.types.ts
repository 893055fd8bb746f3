export type TimeWindow = 'day' | 'week';

/** A provider movie translated into the local movie shape (no local id yet). */
export interface ProviderMovie {
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

export interface ProviderPage {
  page: number;
  totalPages: number;
  totalResults: number;
  results: ProviderMovie[];
}

export interface SearchFilters {
  includeAdult?: boolean;
  year?: number;
  language?: string;
}

/** Everything the service needs from the external catalog. */
export interface MovieGateway {
  fetchTrending(timeWindow: TimeWindow, page: number, language?: string): Promise<ProviderPage>;
  fetchPopular(page: number, language?: string, region?: string): Promise<ProviderPage>;
  fetchTopRated(page: number, language?: string, region?: string): Promise<ProviderPage>;
  fetchUpcoming(page: number, language?: string, region?: string): Promise<ProviderPage>;
  search(query: string, page: number, filters?: SearchFilters): Promise<ProviderPage>;
  fetchMovie(tmdbId: number, language?: string): Promise<ProviderMovie>;
  fetchRecommendations(tmdbId: number, page: number, language?: string): Promise<ProviderPage>;
}
