import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { DocumentBuilder, SwaggerModule } from '@nestjs/swagger';
import type { NextFunction, Request, Response } from 'express';
import {
  API_DEFAULT_HOST,
  API_DEFAULT_PORT,
  API_DOCS_PATH,
  API_GLOBAL_PREFIX,
  API_PREFIX_PATH,
  HTTP_SLOW_REQUEST_THRESHOLD_MS,
} from './app.constants';
import { readAppMeta } from './app.meta';
import { AppModule } from './app.module';
import { ensureBootstrapEnv } from './bootstrap-env';
import { BufferedLogger } from './logs/buffered-logger';

function parsePort(raw: string | undefined, fallback: number): number {
  const parsed = Number.parseInt(raw ?? `${fallback}`, 10);
  return Number.isFinite(parsed) && parsed > 0 && parsed < 65_536 ? parsed : fallback;
}

async function bootstrap() {
  ensureBootstrapEnv();
  const bootstrapLogger = new Logger('Bootstrap');

  process.on('unhandledRejection', (reason) => {
    bootstrapLogger.error(`Unhandled rejection: ${String(reason)}`);
  });

  const app = await NestFactory.create(AppModule, {
    logger: new BufferedLogger(),
  });
  app.enableShutdownHooks();
  app.setGlobalPrefix(API_GLOBAL_PREFIX);

  // Request logging: only warnings, errors and slow requests.
  if (process.env.HTTP_LOGGING === 'true' || process.env.NODE_ENV !== 'production') {
    const httpLogger = new Logger('HTTP');
    app.use((req: Request, res: Response, next: NextFunction) => {
      const start = process.hrtime.bigint();
      res.on('finish', () => {
        const ms = Number(process.hrtime.bigint() - start) / 1e6;
        const msg = `${req.method} ${req.originalUrl || req.url} -> ${res.statusCode} ${ms.toFixed(0)}ms`;
        if (res.statusCode >= 500) httpLogger.error(msg);
        else if (res.statusCode >= 400) httpLogger.warn(msg);
        else if (ms >= HTTP_SLOW_REQUEST_THRESHOLD_MS) httpLogger.warn(`SLOW ${msg}`);
      });
      next();
    });
  }

  if (process.env.SWAGGER_ENABLED === 'true' || process.env.NODE_ENV !== 'production') {
    const meta = readAppMeta();
    const config = new DocumentBuilder()
      .setTitle('Orphanarr API')
      .setDescription('Find files on disk that no qBittorrent torrent references.')
      .setVersion(meta.version)
      .build();
    const document = SwaggerModule.createDocument(app, config);
    // Swagger routes ignore the global prefix; API_DOCS_PATH already includes it.
    SwaggerModule.setup(API_DOCS_PATH, app, document);
  }

  const port = parsePort(process.env.PORT, API_DEFAULT_PORT);
  const host = process.env.HOST?.trim() || API_DEFAULT_HOST;
  try {
    await app.listen(port, host);
  } catch (err) {
    if (err instanceof Error && 'code' in err && err.code === 'EADDRINUSE') {
      bootstrapLogger.error(
        `Port ${port} is already in use. Stop the other process or set PORT to a free port.`,
      );
      process.exit(1);
    }
    throw err;
  }

  bootstrapLogger.log(`API listening: http://${host}:${port}${API_PREFIX_PATH}`);
}

void bootstrap().catch((err) => {
  const logger = new Logger('Bootstrap');
  logger.error(err instanceof Error ? (err.stack ?? err.message) : String(err));
  process.exit(1);
});
