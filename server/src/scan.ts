// server/src/scan.ts
import fs from 'fs';
import type { Dirent } from 'fs';
import path from 'path';
import { bestEffort, valueOf, type CatalogClient } from './catalog.js';
import { parseEpisode, parseMovie } from './parse.js';
import { episodeFileBase, movieFileBase, movieFolderName, seasonFolderName, showFolderName, yearOf } from './renamer.js';
import type { EpisodeCandidate, FolderLayout, RenamePlanEntry, ScanResult } from './types.js';
import { ValidationError, errorMessage } from './errors.js';
import { log } from './logging.js';

export interface WalkEntry {
  /** absolute directory path */
  dir: string;
  /** path relative to the scan root, '' for the root itself */
  rel: string;
  subdirs: string[];
  files: string[];
}

export type ListDir = (dir: string) => Dirent[];

const listDir: ListDir = (dir) => fs.readdirSync(dir, { withFileTypes: true });

function isDirLink(full: string) {
  try {
    return fs.statSync(full).isDirectory();
  } catch {
    // dangling link
    return false;
  }
}

/**
 * Top-down walk: each directory is listed (files and subdirectories sorted by
 * name) before its subdirectories are visited in order. Links to directories
 * count as subdirectories but are not followed; unreadable directories are
 * skipped with a warning.
 */
export function walkTree(root: string, list: ListDir = listDir): WalkEntry[] {
  const out: WalkEntry[] = [];
  const visit = (dir: string, rel: string) => {
    let entries: Dirent[];
    try {
      entries = list(dir);
    } catch (e) {
      log('warn', `scan: skipping ${dir}: ${errorMessage(e)}`);
      return;
    }
    const subdirs: string[] = [];
    const files: string[] = [];
    const links = new Set<string>();
    for (const ent of entries) {
      if (ent.isDirectory()) {
        subdirs.push(ent.name);
      } else if (ent.isSymbolicLink() && isDirLink(path.join(dir, ent.name))) {
        subdirs.push(ent.name);
        links.add(ent.name);
      } else {
        files.push(ent.name);
      }
    }
    subdirs.sort();
    files.sort();
    out.push({ dir, rel, subdirs, files });
    for (const s of subdirs) {
      if (!links.has(s)) visit(path.join(dir, s), rel ? path.join(rel, s) : s);
    }
  };
  visit(root, '');
  return out;
}

export function classifyLayout(subdirs: readonly string[], files: readonly string[]): FolderLayout {
  if (subdirs.length === 0 && files.length === 1) return { kind: 'single-movie', file: files[0] };
  return { kind: 'show' };
}

export function validateRoot(root: string) {
  if (!root || !fs.existsSync(root) || !fs.statSync(root).isDirectory()) {
    throw new ValidationError(`Please select a valid directory: ${root || '(empty)'}`);
  }
  return path.resolve(root);
}

async function planMovieFolder(rootBase: string, file: string, client: CatalogClient): Promise<RenamePlanEntry[]> {
  const movie = parseMovie(file);
  if (!movie) {
    log('info', `scan: ${file} does not look like a movie, folder keeps its name`);
    return [];
  }
  const result = await client.searchMovie(movie.title, movie.year);
  if (!result) {
    log('info', `scan: no catalog match for movie "${movie.title}"`);
    return [];
  }
  const imdb = await bestEffort(`movie external id ${result.id}`, () => client.getMovieExternalId(result.id));
  return [{ originalRelativePath: rootBase, newRelativePath: movieFolderName(result, valueOf(imdb)) }];
}

function seasonsByFolder(tree: WalkEntry[]) {
  const seasons = new Map<string, number>();
  for (const entry of tree) {
    if (!entry.rel) continue;
    const top = entry.rel.split(path.sep)[0];
    for (const f of entry.files) {
      const ep = parseEpisode(f);
      if (!ep) continue;
      const prev = seasons.get(top);
      if (prev !== undefined && prev !== ep.season) {
        log('warn', `scan: ${top} holds episodes of season ${prev} and ${ep.season}; using ${ep.season}`);
      }
      seasons.set(top, ep.season);
    }
  }
  return seasons;
}

async function planShowFolders(rootBase: string, tree: WalkEntry[], client: CatalogClient): Promise<RenamePlanEntry[]> {
  let first: EpisodeCandidate | undefined;
  for (const entry of tree) {
    for (const f of entry.files) {
      first = parseEpisode(f);
      if (first) break;
    }
    if (first) break;
  }
  if (!first) {
    log('info', 'scan: no episode files found, folders keep their names');
    return [];
  }

  const result = await client.searchShow(first.show);
  const name = result ? result.name : first.show;
  const year = result ? yearOf(result.firstAirDate) : '';
  const imdb = result
    ? valueOf(await bestEffort(`show external id ${result.id}`, () => client.getShowExternalId(result.id)))
    : undefined;

  const entries: RenamePlanEntry[] = [];
  for (const [dir, season] of seasonsByFolder(tree)) {
    entries.push({ originalRelativePath: dir, newRelativePath: seasonFolderName(season) });
  }
  entries.push({ originalRelativePath: rootBase, newRelativePath: showFolderName(name, year, imdb) });
  return entries;
}

/** New name for a single file, extension kept; unrecognized names come back unchanged. */
export async function proposeFileName(filename: string, client: CatalogClient): Promise<string> {
  const ext = path.extname(filename);
  const movie = parseMovie(filename);
  if (movie) {
    const result = await client.searchMovie(movie.title, movie.year);
    return movieFileBase(movie, result) + ext;
  }
  const ep = parseEpisode(filename);
  if (ep) {
    const show = await client.searchShow(ep.show);
    if (!show) return episodeFileBase(ep.show, ep) + ext;
    const title = await bestEffort(`episode title ${show.id} S${ep.season}E${ep.episode}`,
      () => client.getEpisodeTitle(show.id, ep.season, ep.episode));
    return episodeFileBase(show.name, ep, valueOf(title)) + ext;
  }
  return filename;
}

export async function scanFolder(root: string, client: CatalogClient): Promise<ScanResult> {
  const resolved = validateRoot(root);
  const rootBase = path.basename(resolved);
  const tree = walkTree(resolved);
  if (!tree.length) throw new ValidationError(`Cannot read directory: ${resolved}`);
  const layout = classifyLayout(tree[0].subdirs, tree[0].files);
  log('info', `scan: ${resolved} classified as ${layout.kind}`);

  const folders = layout.kind === 'single-movie'
    ? await planMovieFolder(rootBase, layout.file, client)
    : await planShowFolders(rootBase, tree, client);

  // every path already on disk, plus each planned name once it is handed out
  const taken = new Set<string>();
  for (const entry of tree) {
    for (const name of [...entry.subdirs, ...entry.files]) taken.add(entry.rel ? path.join(entry.rel, name) : name);
  }

  const files: RenamePlanEntry[] = [];
  for (const entry of tree) {
    for (const f of entry.files) {
      const original = entry.rel ? path.join(entry.rel, f) : f;
      const next = await proposeFileName(f, client);
      let proposed = entry.rel ? path.join(entry.rel, next) : next;
      if (proposed !== original && taken.has(proposed)) {
        log('warn', `scan: ${original} would collide with ${proposed}, keeping its name`);
        proposed = original;
      }
      taken.add(proposed);
      files.push({ originalRelativePath: original, newRelativePath: proposed });
    }
  }

  log('info', `scan: ${folders.length} folder and ${files.length} file entries for ${resolved}`);
  return { root: resolved, layout: layout.kind, folders, files };
}
