import { Controller, Get } from '@nestjs/common';
import { ApiOkResponse, ApiTags } from '@nestjs/swagger';
import { AppMetaResponseDto, HealthResponseDto } from './app.dto';
import { AppService } from './app.service';

@Controller()
@ApiTags('app')
export class AppController {
  constructor(private readonly appService: AppService) {}

  @Get('health')
  @ApiOkResponse({ type: HealthResponseDto })
  getHealth() {
    return this.appService.getHealth();
  }

  @Get('meta')
  @ApiOkResponse({ type: AppMetaResponseDto })
  getMeta() {
    return this.appService.getMeta();
  }
}
