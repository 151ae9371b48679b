import { Module } from '@nestjs/common';
import { AppController } from './app.controller';
import { AppService } from './app.service';
import { LogsModule } from './logs/logs.module';
import { OrphansModule } from './orphans/orphans.module';
import { QbittorrentModule } from './qbittorrent/qbittorrent.module';
import { SettingsModule } from './settings/settings.module';

@Module({
  imports: [
    SettingsModule,
    LogsModule,
    QbittorrentModule,
    OrphansModule,
  ],
  controllers: [AppController],
  providers: [AppService],
})
export class AppModule {}
