export type Provider = 'TMDB';

export interface Settings {
  provider: Provider;
  apiKey: string;
}

export interface MovieCandidate {
  readonly title: string;
  readonly year?: number;
}

export interface EpisodeCandidate {
  readonly show: string;
  readonly season: number;
  readonly episode: number;
}

export interface CatalogMovieResult {
  id: number;
  title: string;
  /** YYYY-MM-DD, may be empty */
  releaseDate: string;
}

export interface CatalogShowResult {
  id: number;
  name: string;
  firstAirDate: string;
}

export interface RenamePlanEntry {
  originalRelativePath: string;
  newRelativePath: string;
}

export type FolderLayout =
  | { kind: 'single-movie'; file: string }
  | { kind: 'show' };

export interface ScanResult {
  root: string;
  layout: FolderLayout['kind'];
  /** season folders first, root entry (if any) last */
  folders: RenamePlanEntry[];
  files: RenamePlanEntry[];
}

/**
 * Renames grouped by the phase they run in. Files go first, then season
 * folders, then the root folder itself.
 */
export interface RenamePlan {
  root: string;
  files: RenamePlanEntry[];
  folders: RenamePlanEntry[];
  rootEntry?: RenamePlanEntry;
}

export interface RenameError {
  label: string;
  message: string;
}
