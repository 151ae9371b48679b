import { Module } from '@nestjs/common';
import { QbittorrentController } from './qbittorrent.controller';
import { QbittorrentService } from './qbittorrent.service';

@Module({
  controllers: [QbittorrentController],
  providers: [QbittorrentService],
  exports: [QbittorrentService],
})
export class QbittorrentModule {}
