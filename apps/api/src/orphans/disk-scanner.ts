import { Injectable, Logger } from '@nestjs/common';
import type { Dirent, Stats } from 'node:fs';
import { readdir, stat } from 'node:fs/promises';
import { join, relative } from 'node:path';
import { ScanError } from './orphans.errors';
import type { CategoryMapping, DiskFile } from './orphans.types';

export type DiskScanEvent =
  | { type: 'file'; file: DiskFile }
  | { type: 'error'; error: ScanError };

function directoryIdentity(info: Stats): string {
  return `${info.dev}:${info.ino}`;
}

function byName(a: Dirent, b: Dirent): number {
  if (a.name < b.name) return -1;
  if (a.name > b.name) return 1;
  return 0;
}

@Injectable()
export class DiskScanner {
  private readonly logger = new Logger(DiskScanner.name);

  /**
   * Walk every category root and yield its regular files.
   *
   * Each call is a fresh traversal. Problems with one category (or one
   * directory inside it) are yielded as `error` events and the walk goes on.
   */
  async *scan(mapping: CategoryMapping): AsyncGenerator<DiskScanEvent> {
    for (const [category, root] of mapping) {
      yield* this.scanCategory(category, root);
    }
  }

  private async *scanCategory(
    category: string,
    root: string,
  ): AsyncGenerator<DiskScanEvent> {
    let rootInfo: Stats;
    try {
      rootInfo = await stat(root);
    } catch (err) {
      yield { type: 'error', error: new ScanError({ category, path: root, cause: err }) };
      return;
    }
    if (!rootInfo.isDirectory()) {
      yield {
        type: 'error',
        error: new ScanError({
          category,
          path: root,
          cause: new Error('not a directory'),
        }),
      };
      return;
    }

    // Visited directory identities, scoped to this category's traversal.
    const visited = new Set<string>([directoryIdentity(rootInfo)]);
    const pending: string[] = [root];
    let files = 0;

    while (pending.length) {
      const dir = pending.pop();
      if (dir === undefined) break;

      let entries: Dirent[];
      try {
        entries = await readdir(dir, { withFileTypes: true });
      } catch (err) {
        yield { type: 'error', error: new ScanError({ category, path: dir, cause: err }) };
        continue;
      }
      entries.sort(byName);

      const subdirs: string[] = [];
      for (const entry of entries) {
        if (!entry.isFile() && !entry.isDirectory() && !entry.isSymbolicLink()) {
          continue;
        }
        const fullPath = join(dir, entry.name);

        let info: Stats;
        try {
          // stat() follows a symlink to its target.
          info = await stat(fullPath);
        } catch (err) {
          yield {
            type: 'error',
            error: new ScanError({ category, path: fullPath, cause: err }),
          };
          continue;
        }

        if (info.isDirectory()) {
          const id = directoryIdentity(info);
          if (visited.has(id)) {
            this.logger.debug(`Skipping already visited directory: ${fullPath}`);
            continue;
          }
          visited.add(id);
          subdirs.push(fullPath);
        } else if (info.isFile()) {
          files += 1;
          yield {
            type: 'file',
            file: {
              category,
              path: fullPath,
              relativePath: relative(root, fullPath),
              size: info.size,
            },
          };
        }
      }

      // Reverse so the stack pops sub-directories in name order.
      for (let i = subdirs.length - 1; i >= 0; i -= 1) pending.push(subdirs[i]);
    }

    this.logger.debug(`Scanned category=${category} root=${root} files=${files}`);
  }
}
