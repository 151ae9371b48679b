import { ResolutionError } from './orphans.errors';
import type { TorrentRecord } from './orphans.types';
import { categoryLabel } from './orphans.types';
import { categoryKey } from './path-normalize';

export type TrackedFileIndex = {
  /** `categoryKey(category, file)` for every resolvable torrent file. */
  keys: Set<string>;
  /** File entries seen, before duplicate keys collapse. */
  trackedFiles: number;
  errors: ResolutionError[];
};

export function buildTrackedFileIndex(
  torrents: Iterable<TorrentRecord>,
): TrackedFileIndex {
  const index: TrackedFileIndex = {
    keys: new Set<string>(),
    trackedFiles: 0,
    errors: [],
  };

  for (const torrent of torrents) {
    if (torrent.files === null) {
      index.errors.push(
        new ResolutionError({
          torrentHash: torrent.hash,
          torrentName: torrent.name,
          reason: 'file list is not available',
        }),
      );
      continue;
    }
    if (!torrent.files.length) continue;

    if (!torrent.savePath?.trim()) {
      index.errors.push(
        new ResolutionError({
          torrentHash: torrent.hash,
          torrentName: torrent.name,
          reason: 'save path is not available',
        }),
      );
      continue;
    }

    const category = categoryLabel(torrent.category);
    for (const file of torrent.files) {
      index.keys.add(categoryKey(category, file.name));
      index.trackedFiles += 1;
    }
  }

  return index;
}
