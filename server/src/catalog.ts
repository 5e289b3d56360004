import type { CatalogMovieResult, CatalogShowResult } from './types.js';
import { errorMessage } from './errors.js';
import { log } from './logging.js';

/**
 * Remote movie/TV catalog used to enrich parsed candidates.
 *
 * Searches are primary lookups: implementations throw `LookupFailure` and the
 * caller lets it propagate. Everything else is secondary and is read through
 * {@link bestEffort}.
 */
export interface CatalogClient {
  searchMovie(title: string, year?: number): Promise<CatalogMovieResult | undefined>;
  searchShow(title: string, year?: number): Promise<CatalogShowResult | undefined>;
  getEpisodeTitle(showId: number, season: number, episode: number): Promise<string | undefined>;
  getMovieExternalId(movieId: number): Promise<string | undefined>;
  getShowExternalId(showId: number): Promise<string | undefined>;
}

export type Lookup<T> =
  | { kind: 'found'; value: T }
  | { kind: 'absent' }
  | { kind: 'failed'; error: string };

export async function bestEffort<T>(label: string, fn: () => Promise<T | undefined | null>): Promise<Lookup<T>> {
  try {
    const value = await fn();
    if (value === undefined || value === null || value === '') return { kind: 'absent' };
    return { kind: 'found', value };
  } catch (e) {
    log('warn', `${label} failed: ${errorMessage(e)}`);
    return { kind: 'failed', error: errorMessage(e) };
  }
}

export function valueOf<T>(lookup: Lookup<T>): T | undefined {
  return lookup.kind === 'found' ? lookup.value : undefined;
}

export function normalizeName(s: string | undefined) {
  return String(s || '').replace(/\W+/g, '').toLowerCase();
}

// Exact name match on the normalized form, else the provider's top result.
export function pickShowResult<T extends { name: string }>(query: string, results: T[]): T | undefined {
  if (!results.length) return undefined;
  const q = normalizeName(query);
  return results.find(r => normalizeName(r.name) === q) ?? results[0];
}
