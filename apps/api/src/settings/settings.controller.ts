import { Controller, Get } from '@nestjs/common';
import { ApiTags } from '@nestjs/swagger';
import { describeSettings } from './orphan-settings';
import { SettingsService } from './settings.service';

@Controller('settings')
@ApiTags('settings')
export class SettingsController {
  constructor(private readonly settingsService: SettingsService) {}

  @Get()
  get() {
    return describeSettings(this.settingsService.get());
  }
}
