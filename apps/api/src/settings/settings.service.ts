import { Injectable, Logger } from '@nestjs/common';
import type { OrphanSettings } from './orphan-settings';
import { loadOrphanSettings } from './orphan-settings';

@Injectable()
export class SettingsService {
  private readonly logger = new Logger(SettingsService.name);
  private readonly settings: OrphanSettings;

  constructor() {
    this.settings = loadOrphanSettings(process.env);
    for (const warning of this.settings.warnings) this.logger.warn(warning);
    this.logger.log(
      `Loaded ${this.settings.categories.size} category folder(s), ` +
        `${this.settings.excludePatterns.length} exclude pattern(s), ` +
        `${this.settings.ignoreSuffixes.size} ignored suffix(es)`,
    );
  }

  get(): OrphanSettings {
    return this.settings;
  }
}
