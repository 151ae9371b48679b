import { Injectable } from '@nestjs/common';
import type { AppMetaResponseDto, HealthResponseDto } from './app.dto';
import { readAppMeta } from './app.meta';

@Injectable()
export class AppService {
  getHealth(): HealthResponseDto {
    return {
      status: 'ok' as const,
      time: new Date().toISOString(),
    };
  }

  getMeta(): AppMetaResponseDto {
    return readAppMeta();
  }
}
