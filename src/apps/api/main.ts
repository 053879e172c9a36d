import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import {
  FastifyAdapter,
  NestFastifyApplication,
} from '@nestjs/platform-fastify';
import { MetricsService } from '@/shared/metrics/services/metrics.service';
import { ScrapeExceptionFilter } from '@/shared/common/filters/scrape-exception.filter';
import { setupGracefulShutdown } from '@/shared/utils/graceful-shutdown';
import { ApiAppModule } from './app.module';
import { registerRequestMetrics } from './hooks/request-metrics.hook';

async function bootstrap() {
  const logger = new Logger('Api');
  const adapter = new FastifyAdapter({ trustProxy: true });
  const app = await NestFactory.create<NestFastifyApplication>(
    ApiAppModule,
    adapter,
  );

  registerRequestMetrics(adapter.getInstance(), app.get(MetricsService));

  app.useGlobalFilters(new ScrapeExceptionFilter());
  app.enableCors({
    origin: true,
    methods: ['GET', 'POST', 'OPTIONS'],
  });
  setupGracefulShutdown(app);

  const port = app.get(ConfigService).get<number>('PORT') ?? 8000;
  await app.listen(port, '0.0.0.0');
  logger.log(`Scrape job API listening on port ${port}`);
}
void bootstrap();
