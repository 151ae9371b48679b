import { Controller, HttpCode, Post } from '@nestjs/common';
import { ApiTags } from '@nestjs/swagger';
import { SettingsService } from '../settings/settings.service';
import { QbittorrentService } from './qbittorrent.service';

@Controller('qbittorrent')
@ApiTags('qbittorrent')
export class QbittorrentController {
  constructor(
    private readonly qbittorrentService: QbittorrentService,
    private readonly settingsService: SettingsService,
  ) {}

  @Post('test')
  @HttpCode(200)
  test() {
    return this.qbittorrentService.testConnection(this.settingsService.get().qbittorrent);
  }
}
