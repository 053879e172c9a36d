import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { ScheduleModule } from '@nestjs/schedule';
import { loadEnv } from '@/shared/config/load-env';
import { validationSchema } from '@/shared/config/env.validation';
import { BrowserModule } from '@/shared/browser/browser.module';
import { JobsModule } from '@/shared/jobs/jobs.module';
import { MetricsModule } from '@/shared/metrics/metrics.module';
import { TasksModule } from '@/shared/tasks/tasks.module';
import { JobsController } from './controllers/jobs.controller';
import { HealthController } from './controllers/health.controller';
import { ApiKeyGuard } from './guards/api-key.guard';
import { JobMapper } from './mappers/job.mapper';

loadEnv();

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      validationSchema,
      ignoreEnvFile: true,
    }),
    ScheduleModule.forRoot(),
    BrowserModule,
    JobsModule,
    TasksModule,
    MetricsModule,
  ],
  controllers: [JobsController, HealthController],
  providers: [JobMapper, ApiKeyGuard],
})
export class ApiAppModule {}
