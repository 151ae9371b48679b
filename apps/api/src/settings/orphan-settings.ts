import { buildIgnoreSuffixes } from '../orphans/orphan-classifier';
import type { CategoryMapping } from '../orphans/orphans.types';
import { UNCATEGORIZED_SENTINEL } from '../orphans/orphans.types';
import { normalizePath } from '../orphans/path-normalize';
import type { QbittorrentConnection } from '../qbittorrent/qbittorrent.types';

type EnvLike = Record<string, string | undefined>;

export const QBIT_DEFAULT_HOST = 'http://qbittorrent:8080';
export const QBIT_DEFAULT_USER = 'admin';
export const QBIT_DEFAULT_PASS = 'password';
export const QBIT_DEFAULT_TIMEOUT_MS = 20_000;

export type OrphanSettings = Readonly<{
  qbittorrent: Readonly<QbittorrentConnection>;
  categories: CategoryMapping;
  excludePatterns: readonly string[];
  /** Defaults plus configured extras, normalized to `.ext`. */
  ignoreSuffixes: ReadonlySet<string>;
  scanCron: string | null;
  /** Non-fatal problems found while loading (skipped entries etc.). */
  warnings: readonly string[];
}>;

export class OrphanSettingsError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'OrphanSettingsError';
  }
}

/** Trim whitespace and the quotes some shells and compose files leave around values. */
export function readEnv(env: EnvLike, name: string, fallback: string): string {
  const raw = env[name];
  if (raw === undefined) return fallback;
  return raw.trim().replace(/^["']+|["']+$/g, '').trim();
}

export function parseList(raw: string): string[] {
  return raw
    .split(',')
    .map((p) => p.trim())
    .filter(Boolean);
}

/** `Films=/mnt/films;Shows=/mnt/shows` -> ordered category map. */
export function parseCategoryFolders(raw: string): {
  categories: Map<string, string>;
  warnings: string[];
} {
  const categories = new Map<string, string>();
  const warnings: string[] = [];

  for (const pair of raw.split(';')) {
    if (!pair.trim()) continue;
    const eq = pair.indexOf('=');
    const name = eq >= 0 ? pair.slice(0, eq).trim() : '';
    const folder = eq >= 0 ? pair.slice(eq + 1).trim() : '';
    if (!name || !folder) {
      warnings.push(`Skipping malformed CATEGORY_FOLDERS entry: ${JSON.stringify(pair)}`);
      continue;
    }
    if (name === UNCATEGORIZED_SENTINEL) {
      throw new OrphanSettingsError(
        `Category name ${UNCATEGORIZED_SENTINEL} is reserved for torrents without a category`,
      );
    }
    if (categories.has(name)) {
      warnings.push(`Category '${name}' is configured more than once; using the last entry`);
    }
    categories.set(name, folder);
  }

  const seenRoots = new Map<string, string>();
  for (const [name, folder] of categories) {
    const key = normalizePath(folder);
    const other = seenRoots.get(key);
    if (other !== undefined) {
      throw new OrphanSettingsError(
        `Categories '${other}' and '${name}' point at the same folder: ${folder}`,
      );
    }
    seenRoots.set(key, name);
  }

  return { categories, warnings };
}

function normalizeBaseUrl(raw: string): string {
  const withScheme = /^https?:\/\//i.test(raw) ? raw : `http://${raw}`;
  try {
    const parsed = new URL(withScheme);
    if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') {
      throw new Error(`unsupported protocol ${parsed.protocol}`);
    }
  } catch (err) {
    throw new OrphanSettingsError(
      `QBIT_HOST must be a valid http(s) URL: ${err instanceof Error ? err.message : String(err)}`,
    );
  }
  return withScheme.replace(/\/+$/, '');
}

function parsePositiveInt(raw: string, fallback: number): number {
  const parsed = Number.parseInt(raw, 10);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
}

export function loadOrphanSettings(env: EnvLike = process.env): OrphanSettings {
  const { categories, warnings } = parseCategoryFolders(
    readEnv(env, 'CATEGORY_FOLDERS', ''),
  );
  if (!categories.size) {
    warnings.push('CATEGORY_FOLDERS is empty; nothing will be scanned');
  }

  const scanCron = readEnv(env, 'ORPHAN_SCAN_CRON', '') || null;

  return Object.freeze({
    qbittorrent: Object.freeze({
      baseUrl: normalizeBaseUrl(readEnv(env, 'QBIT_HOST', QBIT_DEFAULT_HOST)),
      username: readEnv(env, 'QBIT_USER', QBIT_DEFAULT_USER),
      password: readEnv(env, 'QBIT_PASS', QBIT_DEFAULT_PASS),
      timeoutMs: parsePositiveInt(
        readEnv(env, 'QBIT_TIMEOUT_MS', ''),
        QBIT_DEFAULT_TIMEOUT_MS,
      ),
    }),
    categories,
    excludePatterns: Object.freeze(parseList(readEnv(env, 'EXCLUDE_PATTERNS', ''))),
    ignoreSuffixes: buildIgnoreSuffixes(parseList(readEnv(env, 'IGNORE_SUFFIXES', ''))),
    scanCron,
    warnings: Object.freeze(warnings),
  });
}

/** Settings as safe to show over HTTP. */
export function describeSettings(settings: OrphanSettings) {
  return {
    qbittorrent: {
      baseUrl: settings.qbittorrent.baseUrl,
      username: settings.qbittorrent.username,
      password: settings.qbittorrent.password ? '********' : '',
      timeoutMs: settings.qbittorrent.timeoutMs,
    },
    categories: Array.from(settings.categories, ([name, root]) => ({ name, root })),
    excludePatterns: [...settings.excludePatterns],
    ignoreSuffixes: Array.from(settings.ignoreSuffixes).sort(),
    scanCron: settings.scanCron,
    warnings: [...settings.warnings],
  };
}
