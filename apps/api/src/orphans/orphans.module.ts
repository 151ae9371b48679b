import { Module } from '@nestjs/common';
import { QbittorrentModule } from '../qbittorrent/qbittorrent.module';
import { DiskScanner } from './disk-scanner';
import { OrphansController } from './orphans.controller';
import { OrphansScheduler } from './orphans.scheduler';
import { OrphansService } from './orphans.service';

@Module({
  imports: [QbittorrentModule],
  controllers: [OrphansController],
  providers: [DiskScanner, OrphansService, OrphansScheduler],
  exports: [OrphansService],
})
export class OrphansModule {}
