import fetch, { type Response } from 'node-fetch';
import { z } from 'zod';
import { pickShowResult, type CatalogClient } from './catalog.js';
import type { CatalogMovieResult, CatalogShowResult } from './types.js';
import { LookupFailure, errorMessage } from './errors.js';
import { log } from './logging.js';

export const TMDB_BASE_URL = 'https://api.themoviedb.org/3';

const MovieSearchSchema = z.object({
  results: z.array(z.object({
    id: z.number(),
    title: z.string().optional(),
    release_date: z.string().nullish(),
  })).nullish(),
});

const ShowSearchSchema = z.object({
  results: z.array(z.object({
    id: z.number(),
    name: z.string().optional(),
    first_air_date: z.string().nullish(),
  })).nullish(),
});

const EpisodeSchema = z.object({ name: z.string().nullish() });
const ExternalIdsSchema = z.object({ imdb_id: z.string().nullish() });

export function createTmdbClient(apiKey: string, baseUrl = TMDB_BASE_URL): CatalogClient {
  async function tmdb<T>(path: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>, params: Record<string, string | number | undefined> = {}): Promise<T> {
    const q = new URLSearchParams({ api_key: apiKey });
    for (const [k, v] of Object.entries(params)) if (v !== undefined && v !== '') q.set(k, String(v));
    log('debug', `tmdb: GET ${path}`);
    let res: Response;
    try {
      res = await fetch(`${baseUrl}${path}?${q}`);
    } catch (e) {
      throw new LookupFailure(`TMDB ${path} request failed: ${errorMessage(e)}`, path, undefined, e);
    }
    if (!res.ok) {
      log('error', `TMDB ${path} failed: ${res.status}`);
      throw new LookupFailure(`TMDB ${path} failed: ${res.status}`, path, res.status);
    }
    let body: unknown;
    try {
      body = await res.json();
    } catch (e) {
      log('error', `TMDB ${path} body could not be read: ${errorMessage(e)}`);
      throw new LookupFailure(`TMDB ${path} returned an unreadable body: ${errorMessage(e)}`, path, res.status, e);
    }
    const parsed = schema.safeParse(body);
    if (!parsed.success) {
      throw new LookupFailure(`TMDB ${path} returned an unexpected body`, path, res.status, parsed.error);
    }
    return parsed.data;
  }

  return {
    async searchMovie(title, year) {
      const js = await tmdb('/search/movie', MovieSearchSchema, { query: title, year: year || undefined });
      const first = (js.results || [])[0];
      log('debug', `searchMovie: query=${title} year=${year} results=${(js.results || []).length}`);
      if (!first) return undefined;
      const result: CatalogMovieResult = { id: first.id, title: first.title ?? title, releaseDate: first.release_date || '' };
      return result;
    },

    async searchShow(title, year) {
      const js = await tmdb('/search/tv', ShowSearchSchema, { query: title, first_air_date_year: year || undefined });
      const results: CatalogShowResult[] = (js.results || []).map(r => ({
        id: r.id,
        name: r.name ?? '',
        firstAirDate: r.first_air_date || '',
      }));
      log('debug', `searchShow: query=${title} year=${year} results=${results.length}`);
      const picked = pickShowResult(title, results);
      if (picked && !picked.name) return { ...picked, name: title };
      return picked;
    },

    async getEpisodeTitle(showId, season, episode) {
      const js = await tmdb(`/tv/${showId}/season/${season}/episode/${episode}`, EpisodeSchema);
      return js.name || undefined;
    },

    async getMovieExternalId(movieId) {
      const js = await tmdb(`/movie/${movieId}/external_ids`, ExternalIdsSchema);
      return js.imdb_id || undefined;
    },

    async getShowExternalId(showId) {
      const js = await tmdb(`/tv/${showId}/external_ids`, ExternalIdsSchema);
      return js.imdb_id || undefined;
    },
  };
}
