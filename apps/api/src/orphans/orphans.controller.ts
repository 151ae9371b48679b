import { Controller, Get, HttpCode, NotFoundException, Post } from '@nestjs/common';
import { ApiBadGatewayResponse, ApiOkResponse, ApiTags } from '@nestjs/swagger';
import { OrphansService } from './orphans.service';

const SCAN_RESULT_EXAMPLE = {
  startedAt: '2026-01-02T00:00:00.000Z',
  finishedAt: '2026-01-02T00:00:04.000Z',
  torrents: 12,
  trackedKeys: 48,
  reports: [
    {
      category: 'Films',
      root: '/mnt/films',
      files: [
        {
          category: 'Films',
          path: '/mnt/films/Old Movie.mkv',
          relativePath: 'Old Movie.mkv',
          size: 5000,
        },
      ],
      totalBytes: 5000,
      counts: { tracked: 40, orphaned: 1, ignored: 6, excluded: 0 },
    },
  ],
  totals: { orphanedFiles: 1, orphanedBytes: 5000 },
  diagnostics: [],
};

@Controller('orphans')
@ApiTags('orphans')
export class OrphansController {
  constructor(private readonly orphansService: OrphansService) {}

  @Post('scan')
  @HttpCode(200)
  @ApiOkResponse({ schema: { example: SCAN_RESULT_EXAMPLE } })
  @ApiBadGatewayResponse({ description: 'qBittorrent could not be reached' })
  scan() {
    return this.orphansService.scan();
  }

  @Get('latest')
  @ApiOkResponse({ schema: { example: SCAN_RESULT_EXAMPLE } })
  latest() {
    const result = this.orphansService.getLatest();
    if (!result) throw new NotFoundException('No orphan scan has run yet');
    return result;
  }
}
