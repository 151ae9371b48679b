import { basename, extname } from 'node:path';
import type { ClassificationOutcome, DiskFile } from './orphans.types';
import { categoryKey } from './path-normalize';

// Metadata, artwork and subtitles that never belong to a torrent payload we care about.
export const DEFAULT_IGNORE_SUFFIXES: readonly string[] = [
  '.nfo',
  '.jpg',
  '.jpeg',
  '.png',
  '.svg',
  '.bin',
  '.txt',
  '.srt',
  '.sub',
  '.idx',
];

const RESOURCE_FORK_PREFIX = '._';

export function normalizeSuffix(raw: string): string {
  const s = raw.trim().toLowerCase();
  if (!s) return '';
  return s.startsWith('.') ? s : `.${s}`;
}

export function buildIgnoreSuffixes(extra: Iterable<string> = []): Set<string> {
  const out = new Set<string>(DEFAULT_IGNORE_SUFFIXES);
  for (const raw of extra) {
    const suffix = normalizeSuffix(raw);
    if (suffix) out.add(suffix);
  }
  return out;
}

export type ClassifierRules = {
  trackedKeys: ReadonlySet<string>;
  /** Full ignore set, defaults included (see `buildIgnoreSuffixes`). */
  ignoreSuffixes: ReadonlySet<string>;
  excludePatterns: readonly string[];
};

function isIgnored(path: string, ignoreSuffixes: ReadonlySet<string>): boolean {
  if (basename(path).startsWith(RESOURCE_FORK_PREFIX)) return true;
  const suffix = extname(path).toLowerCase();
  return Boolean(suffix) && ignoreSuffixes.has(suffix);
}

function isExcluded(path: string, excludePatterns: readonly string[]): boolean {
  return excludePatterns.some((pattern) => pattern !== '' && path.includes(pattern));
}

/**
 * First match wins: ignored suffix, then exclude pattern, then index membership.
 * Ignore rules deliberately take precedence over exclude patterns.
 */
export function classifyDiskFile(
  file: DiskFile,
  rules: ClassifierRules,
): ClassificationOutcome {
  if (isIgnored(file.path, rules.ignoreSuffixes)) return { status: 'ignored', file };
  if (isExcluded(file.path, rules.excludePatterns)) return { status: 'excluded', file };
  if (rules.trackedKeys.has(categoryKey(file.category, file.relativePath))) {
    return { status: 'tracked', file };
  }
  return { status: 'orphaned', file };
}
