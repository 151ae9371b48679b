import {
  DEFAULT_IGNORE_SUFFIXES,
  buildIgnoreSuffixes,
  classifyDiskFile,
  normalizeSuffix,
} from './orphan-classifier';
import type { ClassifierRules } from './orphan-classifier';
import type { DiskFile } from './orphans.types';

function file(relativePath: string, size = 100, category = 'Films'): DiskFile {
  return { category, path: `/mnt/media/${category}/${relativePath}`, relativePath, size };
}

function rules(overrides: Partial<ClassifierRules> = {}): ClassifierRules {
  return {
    trackedKeys: new Set<string>(),
    ignoreSuffixes: buildIgnoreSuffixes(),
    excludePatterns: [],
    ...overrides,
  };
}

describe('classifyDiskFile', () => {
  it('classifies the documented example', () => {
    const r = rules({
      trackedKeys: new Set(['films/movie.mkv']),
      excludePatterns: [' - 720p.mkv'],
    });

    expect(classifyDiskFile(file('Movie.mkv', 5000), r).status).toBe('tracked');
    expect(classifyDiskFile(file('Movie - 720p.mkv', 3000), r).status).toBe('excluded');
    expect(classifyDiskFile(file('movie.nfo', 10), r).status).toBe('ignored');
  });

  it('matches by category-relative path whatever the local root is', () => {
    const r = rules({ trackedKeys: new Set(['films/movie.mkv']) });
    const local: DiskFile = {
      category: 'Films',
      path: '/mnt/films/Movie.mkv',
      relativePath: 'Movie.mkv',
      size: 5000,
    };
    expect(classifyDiskFile(local, r).status).toBe('tracked');
  });

  it('does not match a tracked file of another category', () => {
    const r = rules({ trackedKeys: new Set(['shows/movie.mkv']) });
    expect(classifyDiskFile(file('Movie.mkv'), r).status).toBe('orphaned');
  });

  it('lets ignore rules win over exclude patterns', () => {
    const r = rules({ excludePatterns: ['poster'] });
    expect(classifyDiskFile(file('poster.JPG'), r).status).toBe('ignored');
  });

  it('matches exclude patterns case-sensitively', () => {
    const r = rules({ excludePatterns: ['Sample'] });
    expect(classifyDiskFile(file('Sample.mkv'), r).status).toBe('excluded');
    expect(classifyDiskFile(file('sample.mkv'), r).status).toBe('orphaned');
  });

  it('classifies paths differing only in case the same way', () => {
    const r = rules({ trackedKeys: new Set(['films/show/e01.mkv']) });
    expect(classifyDiskFile(file('Show/E01.mkv'), r).status).toBe('tracked');
    expect(classifyDiskFile(file('SHOW/E01.MKV'), r).status).toBe('tracked');
  });

  it('does not look at size', () => {
    expect(classifyDiskFile(file('empty.mkv', 0), rules()).status).toBe('orphaned');
  });

  it('ignores macOS resource forks', () => {
    expect(classifyDiskFile(file('._Movie.mkv'), rules()).status).toBe('ignored');
  });

  it('treats files without an extension as candidates', () => {
    expect(classifyDiskFile(file('README'), rules()).status).toBe('orphaned');
  });

  it('carries the original file through', () => {
    const f = file('a.mkv', 42);
    expect(classifyDiskFile(f, rules())).toEqual({ status: 'orphaned', file: f });
  });
});

describe('buildIgnoreSuffixes', () => {
  it('adds configured suffixes to the defaults', () => {
    const suffixes = buildIgnoreSuffixes(['PART', '.!qB', ' ']);
    expect(suffixes.has('.part')).toBe(true);
    expect(suffixes.has('.!qb')).toBe(true);
    expect(suffixes.size).toBe(DEFAULT_IGNORE_SUFFIXES.length + 2);
  });

  it('normalizes suffixes to a lower-case dotted form', () => {
    expect(normalizeSuffix('Mkv')).toBe('.mkv');
    expect(normalizeSuffix('.NFO')).toBe('.nfo');
    expect(normalizeSuffix('  ')).toBe('');
  });
});
