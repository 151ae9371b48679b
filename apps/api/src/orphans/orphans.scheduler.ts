import { Injectable, Logger, OnModuleDestroy, OnModuleInit } from '@nestjs/common';
import { CronJob } from 'cron';
import { SettingsService } from '../settings/settings.service';
import { OrphansService } from './orphans.service';

@Injectable()
export class OrphansScheduler implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(OrphansScheduler.name);
  private job: CronJob | null = null;

  constructor(
    private readonly settingsService: SettingsService,
    private readonly orphansService: OrphansService,
  ) {}

  get isScheduled(): boolean {
    return this.job !== null;
  }

  onModuleInit() {
    const cron = this.settingsService.get().scanCron;
    if (!cron) {
      this.logger.debug('ORPHAN_SCAN_CRON not set; scheduled scans disabled');
      return;
    }

    try {
      this.job = new CronJob(cron, () => {
        void this.runScheduledScan();
      });
    } catch (err) {
      // A bad expression should not keep the API from starting.
      this.logger.error(
        `Invalid ORPHAN_SCAN_CRON "${cron}": ${err instanceof Error ? err.message : String(err)}`,
      );
      return;
    }

    this.job.start();
    this.logger.log(`Scheduled orphan scan cron=${cron}`);
  }

  onModuleDestroy() {
    this.job?.stop();
    this.job = null;
  }

  async runScheduledScan(): Promise<void> {
    try {
      const result = await this.orphansService.scan();
      this.logger.log(
        `Scheduled orphan scan done orphaned=${result.totals.orphanedFiles} bytes=${result.totals.orphanedBytes}`,
      );
    } catch (err) {
      this.logger.error(
        `Scheduled orphan scan failed: ${err instanceof Error ? err.message : String(err)}`,
      );
    }
  }
}
