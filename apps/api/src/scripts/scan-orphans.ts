#!/usr/bin/env node
import 'reflect-metadata';
import { Logger, Module } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { ensureBootstrapEnv } from '../bootstrap-env';
import { DiskScanner } from '../orphans/disk-scanner';
import { renderOrphanReport } from '../orphans/orphan-report';
import { OrphansService } from '../orphans/orphans.service';
import { QbittorrentModule } from '../qbittorrent/qbittorrent.module';
import { SettingsModule } from '../settings/settings.module';

/** Just the pipeline: no HTTP controllers and no scheduler. */
@Module({
  imports: [SettingsModule, QbittorrentModule],
  providers: [DiskScanner, OrphansService],
})
class ScanOrphansCliModule {}

async function main() {
  const asJson = process.argv.includes('--json');
  const verbose = process.argv.includes('--verbose');
  ensureBootstrapEnv();

  const app = await NestFactory.createApplicationContext(ScanOrphansCliModule, {
    logger: verbose ? ['log', 'warn', 'error', 'debug'] : ['warn', 'error'],
  });
  try {
    const result = await app.get(OrphansService).scan();
    process.stdout.write(
      `${asJson ? JSON.stringify(result, null, 2) : renderOrphanReport(result)}\n`,
    );
  } finally {
    await app.close();
  }
}

void main().catch((err) => {
  new Logger('scan-orphans').error(
    err instanceof Error ? (err.stack ?? err.message) : String(err),
  );
  process.exit(1);
});
