export const UNCATEGORIZED_SENTINEL = '__UNCATEGORIZED__';

export type CategoryId =
  | { kind: 'named'; name: string }
  | { kind: 'uncategorized' };

export function categoryIdFromClient(raw: string | null | undefined): CategoryId {
  const name = typeof raw === 'string' ? raw.trim() : '';
  return name ? { kind: 'named', name } : { kind: 'uncategorized' };
}

export function categoryLabel(category: CategoryId): string {
  return category.kind === 'named' ? category.name : UNCATEGORIZED_SENTINEL;
}

/** Category name -> absolute root directory, in configured order. */
export type CategoryMapping = ReadonlyMap<string, string>;

export type TorrentFileEntry = {
  /** Path relative to the torrent's save path, as the client reports it. */
  name: string;
  size: number;
};

export type TorrentRecord = {
  hash: string;
  name: string;
  category: CategoryId;
  savePath: string | null;
  /** `null` when the client could not list the files (e.g. the torrent was removed meanwhile). */
  files: TorrentFileEntry[] | null;
};

export type DiskFile = {
  category: string;
  /** Absolute path on the local filesystem. */
  path: string;
  /** Path relative to the category root. */
  relativePath: string;
  size: number;
};

export type ClassificationStatus = 'tracked' | 'orphaned' | 'ignored' | 'excluded';

export type ClassificationOutcome = {
  status: ClassificationStatus;
  file: DiskFile;
};

export type CategoryCounts = Record<ClassificationStatus, number>;

export type CategoryReport = {
  category: string;
  root: string | null;
  files: DiskFile[];
  totalBytes: number;
  counts: CategoryCounts;
};

export type OrphanDiagnostic =
  | {
      kind: 'resolution';
      torrentHash: string;
      torrentName: string;
      message: string;
    }
  | {
      kind: 'scan';
      category: string;
      path: string;
      message: string;
    };

export type OrphanScanResult = {
  startedAt: string;
  finishedAt: string;
  torrents: number;
  trackedKeys: number;
  reports: CategoryReport[];
  totals: { orphanedFiles: number; orphanedBytes: number };
  diagnostics: OrphanDiagnostic[];
};
