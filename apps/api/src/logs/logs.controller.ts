import { BadRequestException, Controller, Get, Query } from '@nestjs/common';
import { ApiTags } from '@nestjs/swagger';
import { listServerLogs } from './server-logs.store';

function parseOptionalInt(raw: string | undefined, name: string): number | undefined {
  if (raw === undefined || raw.trim() === '') return undefined;
  const value = Number.parseInt(raw, 10);
  if (!Number.isFinite(value)) {
    throw new BadRequestException(`${name} must be an integer`);
  }
  return value;
}

@Controller('logs')
@ApiTags('logs')
export class LogsController {
  @Get()
  getLogs(@Query('afterId') afterIdRaw?: string, @Query('limit') limitRaw?: string) {
    const data = listServerLogs({
      afterId: parseOptionalInt(afterIdRaw, 'afterId'),
      limit: parseOptionalInt(limitRaw, 'limit'),
    });
    return { ok: true, ...data };
  }
}
