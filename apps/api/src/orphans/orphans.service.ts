import { Injectable, Logger } from '@nestjs/common';
import { QbittorrentService } from '../qbittorrent/qbittorrent.service';
import type { OrphanSettings } from '../settings/orphan-settings';
import { SettingsService } from '../settings/settings.service';
import { DiskScanner } from './disk-scanner';
import { aggregateOutcomes, sortFilesByPath } from './orphan-aggregator';
import { classifyDiskFile } from './orphan-classifier';
import { ClientUnavailableError } from './orphans.errors';
import type {
  ClassificationOutcome,
  OrphanDiagnostic,
  OrphanScanResult,
  TorrentRecord,
} from './orphans.types';
import { buildTrackedFileIndex } from './tracked-file-index';

@Injectable()
export class OrphansService {
  private readonly logger = new Logger(OrphansService.name);
  private inFlight: Promise<OrphanScanResult> | null = null;
  private latest: OrphanScanResult | null = null;

  constructor(
    private readonly settingsService: SettingsService,
    private readonly qbittorrent: QbittorrentService,
    private readonly diskScanner: DiskScanner,
  ) {}

  getLatest(): OrphanScanResult | null {
    return this.latest;
  }

  /** Run a reconciliation pass, or join the one already running. */
  scan(): Promise<OrphanScanResult> {
    if (this.inFlight) return this.inFlight;
    const run = this.runScan(this.settingsService.get()).finally(() => {
      this.inFlight = null;
    });
    this.inFlight = run;
    return run;
  }

  private async runScan(settings: OrphanSettings): Promise<OrphanScanResult> {
    const startedAt = new Date().toISOString();
    this.logger.log(
      `Orphan scan started categories=${Array.from(settings.categories.keys()).join(',') || 'none'}`,
    );

    let torrents: TorrentRecord[];
    try {
      torrents = await this.qbittorrent.fetchTorrentRecords(settings.qbittorrent);
    } catch (err) {
      const error = new ClientUnavailableError(err);
      this.logger.error(error.message);
      throw error;
    }

    const diagnostics: OrphanDiagnostic[] = [];
    const index = buildTrackedFileIndex(torrents);
    for (const err of index.errors) {
      this.logger.warn(err.message);
      diagnostics.push(err.toDiagnostic());
    }
    this.logger.log(
      `Tracked index built torrents=${torrents.length} files=${index.trackedFiles} keys=${index.keys.size}`,
    );

    const rules = {
      trackedKeys: index.keys,
      ignoreSuffixes: settings.ignoreSuffixes,
      excludePatterns: settings.excludePatterns,
    };
    const outcomes: ClassificationOutcome[] = [];
    for await (const event of this.diskScanner.scan(settings.categories)) {
      if (event.type === 'error') {
        this.logger.warn(event.error.message);
        diagnostics.push(event.error.toDiagnostic());
        continue;
      }
      outcomes.push(classifyDiskFile(event.file, rules));
    }

    const reports = Array.from(
      aggregateOutcomes(outcomes, settings.categories).values(),
      (report) => ({ ...report, files: sortFilesByPath(report.files) }),
    );

    let orphanedFiles = 0;
    let orphanedBytes = 0;
    for (const report of reports) {
      orphanedFiles += report.files.length;
      orphanedBytes += report.totalBytes;
    }

    const result: OrphanScanResult = {
      startedAt,
      finishedAt: new Date().toISOString(),
      torrents: torrents.length,
      trackedKeys: index.keys.size,
      reports,
      totals: { orphanedFiles, orphanedBytes },
      diagnostics,
    };
    this.latest = result;

    this.logger.log(
      `Orphan scan finished orphaned=${orphanedFiles} bytes=${orphanedBytes} diagnostics=${diagnostics.length}`,
    );
    return result;
  }
}
