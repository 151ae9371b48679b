import { ConsoleLogger } from '@nestjs/common';
import type { ServerLogLevel } from './server-logs.store';
import { addServerLog } from './server-logs.store';

/** Console logger that also keeps recent lines for `GET /api/logs`. */
export class BufferedLogger extends ConsoleLogger {
  override log(message: unknown, context?: string) {
    super.log(message, context);
    this.buffer('info', message, context);
  }

  override warn(message: unknown, context?: string) {
    super.warn(message, context);
    this.buffer('warn', message, context);
  }

  override error(message: unknown, stack?: string, context?: string) {
    super.error(message, stack, context);
    addServerLog({ level: 'error', message, stack, context });
  }

  override debug(message: unknown, context?: string) {
    super.debug(message, context);
    this.buffer('debug', message, context);
  }

  override verbose(message: unknown, context?: string) {
    super.verbose(message, context);
    this.buffer('debug', message, context);
  }

  private buffer(level: ServerLogLevel, message: unknown, context?: string) {
    addServerLog({ level, message, context });
  }
}
