import path from 'path';
import type { EpisodeCandidate, MovieCandidate } from './types.js';
import { log } from './logging.js';

// Filenames are parsed in two passes. Movies are tried first; only names that
// carry neither a year nor a leading resolution tag fall through to the
// episode pattern, so an episode whose show name embeds something that looks
// like a year ("Show.1999.S01E01") is read as a movie.

const TOKEN_SPLIT = /[.\s]+/;
const YEAR_TOKEN = /^(19\d{2}|20\d{2})$/;
const RESOLUTION_TOKEN = /^(?:\d{3,4}p|4k)$/i;
const SXXEXX = /(.+?)[\W_]+S(\d{1,2})E(\d{2})/i;

function stripExtension(filename: string) {
  const base = path.basename(filename);
  return path.basename(base, path.extname(base));
}

export function parseMovie(filename: string): MovieCandidate | undefined {
  const tokens = stripExtension(filename).split(TOKEN_SPLIT);

  // earliest year token wins, so "1917.2019.mkv" is an untitled 1917
  for (let i = 0; i < tokens.length; i++) {
    if (YEAR_TOKEN.test(tokens[i])) {
      return { title: tokens.slice(0, i).join(' '), year: Number(tokens[i]) };
    }
  }

  if (tokens.length >= 2 && RESOLUTION_TOKEN.test(tokens[1])) {
    return { title: tokens[0] };
  }
  return undefined;
}

export function parseEpisode(filename: string): EpisodeCandidate | undefined {
  const m = stripExtension(filename).match(SXXEXX);
  if (!m) return undefined;
  const result: EpisodeCandidate = {
    show: m[1].replace(/\./g, ' ').trim(),
    season: Number(m[2]),
    episode: Number(m[3]),
  };
  log('debug', `parseEpisode: ${filename} -> ${JSON.stringify(result)}`);
  return result;
}
