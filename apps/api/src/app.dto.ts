import { ApiProperty } from '@nestjs/swagger';
import { DEFAULT_APP_VERSION } from './app.meta';

export class HealthResponseDto {
  @ApiProperty({ example: 'ok' })
  status!: 'ok';

  @ApiProperty({ example: '2026-01-02T00:00:00.000Z' })
  time!: string;
}

export class AppMetaResponseDto {
  @ApiProperty({ example: 'orphanarr' })
  name!: string;

  @ApiProperty({ example: DEFAULT_APP_VERSION })
  version!: string;

  @ApiProperty({ example: '41fb2cb', nullable: true })
  buildSha!: string | null;
}
