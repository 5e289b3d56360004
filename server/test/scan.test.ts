/**
 * Scan & plan tests
 *
 * Each test builds a small media tree in a temporary directory and scans it
 * against the in-memory catalog from fakeCatalog.ts.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import fs from 'fs'
import os from 'os'
import path from 'path'
import { classifyLayout, proposeFileName, scanFolder, walkTree } from '../src/scan.js'
import { applyRenamePlan } from '../src/renamer.js'
import { LookupFailure, ValidationError } from '../src/errors.js'
import { fakeCatalog } from './fakeCatalog.js'

let tmp: string

function touch(...parts: string[]) {
  const p = path.join(...parts)
  fs.mkdirSync(path.dirname(p), { recursive: true })
  fs.writeFileSync(p, '')
  return p
}

const INCEPTION = { id: 27205, title: 'Inception', releaseDate: '2010-07-15' }
const OFFICE = { id: 2316, name: 'The Office', firstAirDate: '2005-03-24' }

beforeEach(() => {
  tmp = fs.mkdtempSync(path.join(os.tmpdir(), 'renamer-scan-'))
})

afterEach(() => {
  fs.rmSync(tmp, { recursive: true, force: true })
})

// ============================================================================
// LAYOUT
// ============================================================================

describe('classifyLayout', () => {
  it('should treat one file and no subdirectories as a single movie', () => {
    expect(classifyLayout([], ['notes.txt'])).toEqual({ kind: 'single-movie', file: 'notes.txt' })
  })

  it('should treat any subdirectory as a show layout', () => {
    expect(classifyLayout(['Extras'], ['Inception.2010.mkv'])).toEqual({ kind: 'show' })
  })

  it('should treat several files or none as a show layout', () => {
    expect(classifyLayout([], ['a.mkv', 'b.mkv'])).toEqual({ kind: 'show' })
    expect(classifyLayout([], [])).toEqual({ kind: 'show' })
  })
})

describe('walkTree', () => {
  it('should list each directory before descending, in name order', () => {
    touch(tmp, 'b.txt')
    touch(tmp, 'a.txt')
    touch(tmp, 'S2', 'x.mkv')
    touch(tmp, 'S1', 'nested', 'y.mkv')
    fs.mkdirSync(path.join(tmp, 'empty'))

    const tree = walkTree(tmp)

    expect(tree.map(e => [e.rel, e.files])).toEqual([
      ['', ['a.txt', 'b.txt']],
      ['S1', []],
      [path.join('S1', 'nested'), ['y.mkv']],
      ['S2', ['x.mkv']],
      ['empty', []],
    ])
    expect(tree[0].subdirs).toEqual(['S1', 'S2', 'empty'])
  })

  it('should list a link to a directory as a subdirectory without following it', () => {
    touch(tmp, 'elsewhere', 'Movie.2010.mkv')
    const root = path.join(tmp, 'root')
    touch(root, 'a.txt')
    fs.symlinkSync(path.join(tmp, 'elsewhere'), path.join(root, 'Movie.2010.link'))

    const tree = walkTree(root)

    expect(tree).toEqual([{ dir: root, rel: '', subdirs: ['Movie.2010.link'], files: ['a.txt'] }])
  })

  it('should list a dangling link as a file', () => {
    const root = path.join(tmp, 'root')
    touch(root, 'a.txt')
    fs.symlinkSync(path.join(tmp, 'missing'), path.join(root, 'broken'))

    expect(walkTree(root)[0].files).toEqual(['a.txt', 'broken'])
  })

  it('should skip a directory that cannot be read', () => {
    touch(tmp, 'S1', 'x.mkv')
    touch(tmp, 'S2', 'y.mkv')
    const locked = path.join(tmp, 'S1')
    const list = (dir: string) => {
      if (dir === locked) throw new Error('EACCES: permission denied')
      return fs.readdirSync(dir, { withFileTypes: true })
    }

    const tree = walkTree(tmp, list)

    expect(tree.map(e => e.rel)).toEqual(['', 'S2'])
    expect(tree[0].subdirs).toEqual(['S1', 'S2'])
  })
})

// ============================================================================
// VALIDATION
// ============================================================================

describe('scanFolder validation', () => {
  it('should reject a missing root', async () => {
    const client = fakeCatalog()
    await expect(scanFolder(path.join(tmp, 'missing'), client)).rejects.toBeInstanceOf(ValidationError)
    expect(client.searchMovie).not.toHaveBeenCalled()
  })

  it('should reject a root that is a file', async () => {
    const file = touch(tmp, 'Inception.2010.mkv')
    await expect(scanFolder(file, fakeCatalog())).rejects.toBeInstanceOf(ValidationError)
  })
})

// ============================================================================
// SINGLE MOVIE
// ============================================================================

describe('scanFolder single movie', () => {
  it('should rename the folder with year and IMDb id and the file with year', async () => {
    const root = path.join(tmp, 'Inception.2010.1080p')
    touch(root, 'Inception.2010.1080p.BluRay.mkv')
    const client = fakeCatalog({ movies: { Inception: INCEPTION }, movieImdb: { 27205: 'tt1375666' } })

    const result = await scanFolder(root, client)

    expect(result.layout).toBe('single-movie')
    expect(result.root).toBe(root)
    expect(result.folders).toEqual([
      { originalRelativePath: 'Inception.2010.1080p', newRelativePath: 'Inception (2010) {imdb-tt1375666}' },
    ])
    expect(result.files).toEqual([
      { originalRelativePath: 'Inception.2010.1080p.BluRay.mkv', newRelativePath: 'Inception (2010).mkv' },
    ])
    expect(client.searchMovie).toHaveBeenCalledWith('Inception', 2010)
  })

  it('should leave out the IMDb suffix when the id lookup fails', async () => {
    const root = path.join(tmp, 'inception')
    touch(root, 'Inception.2010.mkv')
    const client = fakeCatalog({ movies: { Inception: INCEPTION } }, { imdb: [27205] })

    const result = await scanFolder(root, client)

    expect(result.folders).toEqual([{ originalRelativePath: 'inception', newRelativePath: 'Inception (2010)' }])
  })

  it('should keep empty parentheses when the release date is unknown', async () => {
    const root = path.join(tmp, 'inception')
    touch(root, 'Inception.2010.mkv')
    const client = fakeCatalog({ movies: { Inception: { ...INCEPTION, releaseDate: '' } } })

    const result = await scanFolder(root, client)

    expect(result.folders).toEqual([{ originalRelativePath: 'inception', newRelativePath: 'Inception ()' }])
    expect(result.files).toEqual([{ originalRelativePath: 'Inception.2010.mkv', newRelativePath: 'Inception.mkv' }])
  })

  it('should keep the folder name on a catalog miss and name the file from the parse', async () => {
    const root = path.join(tmp, 'unknown')
    touch(root, 'Some.Film.1987.mkv')

    const result = await scanFolder(root, fakeCatalog())

    expect(result.folders).toEqual([])
    expect(result.files).toEqual([{ originalRelativePath: 'Some.Film.1987.mkv', newRelativePath: 'Some Film (1987).mkv' }])
  })

  it('should keep the folder name when the file is not a movie', async () => {
    const root = path.join(tmp, 'docs')
    touch(root, 'readme.txt')
    const client = fakeCatalog()

    const result = await scanFolder(root, client)

    expect(result.layout).toBe('single-movie')
    expect(result.folders).toEqual([])
    expect(result.files).toEqual([{ originalRelativePath: 'readme.txt', newRelativePath: 'readme.txt' }])
    expect(client.searchMovie).not.toHaveBeenCalled()
  })

  it('should propagate a failed search', async () => {
    const root = path.join(tmp, 'inception')
    touch(root, 'Inception.2010.mkv')
    const client = fakeCatalog()
    client.searchMovie.mockRejectedValueOnce(new LookupFailure('TMDB /search/movie failed: 503', '/search/movie', 503))

    await expect(scanFolder(root, client)).rejects.toBeInstanceOf(LookupFailure)
  })
})

// ============================================================================
// SHOW
// ============================================================================

describe('scanFolder show', () => {
  let root: string

  beforeEach(() => {
    root = path.join(tmp, 'the.office')
    touch(root, 'readme.txt')
    touch(root, 'S1', 'The.Office.S01E01.mkv')
    touch(root, 'S1', 'The.Office.S01E02.mkv')
    touch(root, 'S2', 'The.Office.S02E01.mkv')
  })

  const catalog = () => fakeCatalog(
    {
      shows: { 'The Office': OFFICE },
      showImdb: { 2316: 'tt0386676' },
      episodes: { '2316:1:1': 'Pilot', '2316:1:2': 'Diversity Day' },
    },
    { episodes: ['2316:2:1'] },
  )

  it('should plan season folders, then the show folder, then every file', async () => {
    const client = catalog()

    const result = await scanFolder(root, client)

    expect(result.layout).toBe('show')
    expect(result.folders).toEqual([
      { originalRelativePath: 'S1', newRelativePath: 'Season 01' },
      { originalRelativePath: 'S2', newRelativePath: 'Season 02' },
      { originalRelativePath: 'the.office', newRelativePath: 'The Office (2005) {imdb-tt0386676}' },
    ])
    expect(result.files).toEqual([
      { originalRelativePath: 'readme.txt', newRelativePath: 'readme.txt' },
      { originalRelativePath: path.join('S1', 'The.Office.S01E01.mkv'), newRelativePath: path.join('S1', 'The Office - S01E01 - Pilot.mkv') },
      { originalRelativePath: path.join('S1', 'The.Office.S01E02.mkv'), newRelativePath: path.join('S1', 'The Office - S01E02 - Diversity Day.mkv') },
      { originalRelativePath: path.join('S2', 'The.Office.S02E01.mkv'), newRelativePath: path.join('S2', 'The Office - S02E01.mkv') },
    ])
    expect(client.searchShow).toHaveBeenCalledWith('The Office')
  })

  it('should fall back to parsed names when the show is not in the catalog', async () => {
    const client = fakeCatalog()

    const result = await scanFolder(root, client)

    expect(result.folders).toEqual([
      { originalRelativePath: 'S1', newRelativePath: 'Season 01' },
      { originalRelativePath: 'S2', newRelativePath: 'Season 02' },
      { originalRelativePath: 'the.office', newRelativePath: 'The Office' },
    ])
    expect(result.files[1]).toEqual({
      originalRelativePath: path.join('S1', 'The.Office.S01E01.mkv'),
      newRelativePath: path.join('S1', 'The Office - S01E01.mkv'),
    })
    expect(client.getEpisodeTitle).not.toHaveBeenCalled()
    expect(client.getShowExternalId).not.toHaveBeenCalled()
  })

  it('should let the last episode seen decide a folder season', async () => {
    touch(root, 'Disc1', 'The.Office.S03E01.mkv')
    touch(root, 'Disc1', 'The.Office.S04E01.mkv')

    const result = await scanFolder(root, fakeCatalog())

    expect(result.folders).toContainEqual({ originalRelativePath: 'Disc1', newRelativePath: 'Season 04' })
  })

  it('should map nested episode folders to their top-level subdirectory', async () => {
    touch(root, 'S3', 'disc2', 'The.Office.S03E09.mkv')

    const result = await scanFolder(root, fakeCatalog())

    expect(result.folders.map(f => f.originalRelativePath)).toEqual(['S1', 'S2', 'S3', 'the.office'])
    expect(result.folders[2].newRelativePath).toBe('Season 03')
  })

  it('should emit no folder entries when no file is an episode', async () => {
    const plain = path.join(tmp, 'misc')
    touch(plain, 'a.txt')
    touch(plain, 'b.txt')

    const result = await scanFolder(plain, fakeCatalog())

    expect(result.folders).toEqual([])
    expect(result.files.map(f => f.newRelativePath)).toEqual(['a.txt', 'b.txt'])
  })

  it('should treat one file beside an empty subdirectory as a show layout', async () => {
    const dir = path.join(tmp, 'inception')
    touch(dir, 'Inception.2010.mkv')
    fs.mkdirSync(path.join(dir, 'extras'))

    const result = await scanFolder(dir, fakeCatalog({ movies: { Inception: INCEPTION } }))

    expect(result.layout).toBe('show')
    expect(result.folders).toEqual([])
    expect(result.files).toEqual([{ originalRelativePath: 'Inception.2010.mkv', newRelativePath: 'Inception (2010).mkv' }])
  })

  it('should leave an already renamed tree unchanged', async () => {
    const first = await scanFolder(root, catalog())
    expect(applyRenamePlan(root, first.folders, first.files)).toEqual([])

    const renamedRoot = path.join(tmp, 'The Office (2005) {imdb-tt0386676}')
    const second = await scanFolder(renamedRoot, catalog())

    for (const e of [...second.folders, ...second.files]) {
      expect(e.newRelativePath).toBe(e.originalRelativePath)
    }
    expect(second.folders.map(f => f.originalRelativePath)).toEqual(['Season 01', 'Season 02', 'The Office (2005) {imdb-tt0386676}'])
  })
})

// ============================================================================
// COLLISIONS
// ============================================================================

describe('scanFolder name collisions', () => {
  it('should keep the name of a file whose new name an earlier file already took', async () => {
    const root = path.join(tmp, 'heat')
    touch(root, 'Heat.1995.1080p.mkv')
    touch(root, 'Heat.1995.720p.mkv')

    const result = await scanFolder(root, fakeCatalog())

    expect(result.files).toEqual([
      { originalRelativePath: 'Heat.1995.1080p.mkv', newRelativePath: 'Heat (1995).mkv' },
      { originalRelativePath: 'Heat.1995.720p.mkv', newRelativePath: 'Heat.1995.720p.mkv' },
    ])
    expect(applyRenamePlan(root, result.folders, result.files)).toEqual([])
    expect(fs.readdirSync(root).sort()).toEqual(['Heat (1995).mkv', 'Heat.1995.720p.mkv'])
  })

  it('should keep the name of a file whose new name already exists', async () => {
    const root = path.join(tmp, 'heat')
    touch(root, 'Heat (1995).mkv')
    touch(root, 'Heat.1995.mkv')

    const result = await scanFolder(root, fakeCatalog())

    expect(result.files).toEqual([
      { originalRelativePath: 'Heat (1995).mkv', newRelativePath: 'Heat (1995).mkv' },
      { originalRelativePath: 'Heat.1995.mkv', newRelativePath: 'Heat.1995.mkv' },
    ])
  })
})

describe('scanFolder over links', () => {
  it('should count a linked directory as a subdirectory and leave it untouched', async () => {
    touch(tmp, 'elsewhere', 'Movie.2010.mkv')
    const root = path.join(tmp, 'inception')
    touch(root, 'Inception.2010.mkv')
    fs.symlinkSync(path.join(tmp, 'elsewhere'), path.join(root, 'Movie.2010.link'))

    const result = await scanFolder(root, fakeCatalog({ movies: { Inception: INCEPTION } }))

    expect(result.layout).toBe('show')
    expect(result.files).toEqual([{ originalRelativePath: 'Inception.2010.mkv', newRelativePath: 'Inception (2010).mkv' }])
  })
})

describe('proposeFileName', () => {
  it('should prefer the movie reading of an ambiguous name', async () => {
    const client = fakeCatalog()

    expect(await proposeFileName('Show.1999.S01E01.mkv', client)).toBe('Show (1999).mkv')
    expect(client.searchShow).not.toHaveBeenCalled()
  })

  it('should name a movie with a resolution tag and no year', async () => {
    expect(await proposeFileName('Movie.4k.mkv', fakeCatalog())).toBe('Movie.mkv')
  })
})
