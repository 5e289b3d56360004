import fs from 'fs';
import path from 'path';
import type { CatalogMovieResult, EpisodeCandidate, MovieCandidate, RenameError, RenamePlan, RenamePlanEntry, ScanResult } from './types.js';
import { errorMessage } from './errors.js';
import { log } from './logging.js';

function sanitize(s: string) {
  if (!s) return '';
  // Only the path separator and control characters are dropped; titles
  // otherwise keep their punctuation and capitalization.
  const cleaned = String(s).replace(/[\/\u0000-\u001F]/g, '');
  return cleaned.replace(/\s+/g, ' ').trim();
}
export function pad2(n: number) { return String(n).padStart(2, '0'); }

export function imdbSuffix(imdbId: string | undefined) {
  return imdbId ? ` {imdb-${imdbId}}` : '';
}

export function yearOf(date: string | undefined) {
  return (date || '').slice(0, 4);
}

/** "Title (YYYY) {imdb-tt...}"; an empty release date still yields "Title ()". */
export function movieFolderName(result: CatalogMovieResult, imdbId?: string) {
  return `${sanitize(result.title)} (${yearOf(result.releaseDate)})${imdbSuffix(imdbId)}`;
}

export function showFolderName(name: string, year: string, imdbId?: string) {
  const base = year ? `${sanitize(name)} (${year})` : sanitize(name);
  return base + imdbSuffix(imdbId);
}

export function seasonFolderName(season: number) {
  return `Season ${pad2(season)}`;
}

export function movieFileBase(parsed: MovieCandidate, result?: CatalogMovieResult) {
  if (result) {
    const year = yearOf(result.releaseDate);
    const title = sanitize(result.title);
    return year ? `${title} (${year})` : title;
  }
  const title = sanitize(parsed.title);
  return parsed.year ? `${title} (${parsed.year})` : title;
}

export function episodeFileBase(showName: string, ep: EpisodeCandidate, episodeTitle?: string) {
  const code = `S${pad2(ep.season)}E${pad2(ep.episode)}`;
  const base = `${sanitize(showName)} - ${code}`;
  return episodeTitle ? `${base} - ${sanitize(episodeTitle)}` : base;
}

/** Splits scan output into the three phases the executor runs in. */
export function toRenamePlan(scan: Pick<ScanResult, 'root' | 'folders' | 'files'>): RenamePlan {
  const rootBase = path.basename(path.resolve(scan.root));
  const plan: RenamePlan = { root: scan.root, files: [...scan.files], folders: [] };
  for (const f of scan.folders) {
    if (f.originalRelativePath === rootBase) plan.rootEntry = f;
    else plan.folders.push(f);
  }
  return plan;
}

export interface RenameOps {
  mkdirp(dir: string): void;
  rename(from: string, to: string): void;
  /** true when `to` exists and is not the same entry as `from` */
  occupied(from: string, to: string): boolean;
}

export const fsRenameOps: RenameOps = {
  mkdirp: (dir) => { fs.mkdirSync(dir, { recursive: true }); },
  rename: (from, to) => fs.renameSync(from, to),
  occupied: (from, to) => {
    const dst = fs.lstatSync(to, { throwIfNoEntry: false });
    if (!dst) return false;
    // a case-only rename on a case-insensitive volume finds the source itself
    const src = fs.lstatSync(from, { throwIfNoEntry: false });
    return !src || src.dev !== dst.dev || src.ino !== dst.ino;
  },
};

function move(ops: RenameOps, from: string, to: string) {
  if (ops.occupied(from, to)) throw new Error('destination exists');
  ops.rename(from, to);
}

function attempt(errors: RenameError[], label: string, fn: () => void) {
  try {
    fn();
  } catch (e) {
    log('error', `${label}: ${errorMessage(e)}`);
    errors.push({ label, message: errorMessage(e) });
  }
}

/**
 * Applies a plan in order: files, then season folders, then the root folder.
 * Renaming the root earlier would invalidate every path resolved against it.
 * Failures are collected and never stop the batch; an existing destination
 * is reported as a failure instead of being replaced.
 */
export function applyPlan(plan: RenamePlan, ops: RenameOps = fsRenameOps): RenameError[] {
  const root = path.resolve(plan.root);
  const errors: RenameError[] = [];

  for (const f of plan.files) {
    const src = path.join(root, f.originalRelativePath);
    const dst = path.join(root, f.newRelativePath);
    if (src === dst) continue;
    attempt(errors, `File ${f.originalRelativePath}`, () => {
      ops.mkdirp(path.dirname(dst));
      move(ops, src, dst);
      log('info', `renamed ${f.originalRelativePath} -> ${f.newRelativePath}`);
    });
  }

  for (const d of plan.folders) {
    const src = path.join(root, d.originalRelativePath);
    const dst = path.join(root, d.newRelativePath);
    if (src === dst) continue;
    attempt(errors, `Folder ${d.originalRelativePath}`, () => {
      move(ops, src, dst);
      log('info', `renamed folder ${d.originalRelativePath} -> ${d.newRelativePath}`);
    });
  }

  const r = plan.rootEntry;
  if (r && r.originalRelativePath !== r.newRelativePath) {
    const dst = path.join(path.dirname(root), r.newRelativePath);
    attempt(errors, `Root folder ${r.originalRelativePath}`, () => {
      move(ops, root, dst);
      log('info', `renamed root ${root} -> ${dst}`);
    });
  }

  if (errors.length) log('warn', `rename finished with ${errors.length} error(s)`);
  return errors;
}

export function applyRenamePlan(root: string, folders: RenamePlanEntry[], files: RenamePlanEntry[], ops: RenameOps = fsRenameOps) {
  return applyPlan(toRenamePlan({ root, folders, files }), ops);
}
