import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { BrowserModule } from '@/shared/browser/browser.module';
import { MetricsModule } from '@/shared/metrics/metrics.module';
import { TasksModule } from '@/shared/tasks/tasks.module';
import { JobJanitorService } from './services/job-janitor.service';
import { JobManagerService } from './services/job-manager.service';
import { JobStoreService } from './services/job-store.service';
import { ResultWriterService } from './services/result-writer.service';

@Module({
  imports: [ConfigModule, BrowserModule, TasksModule, MetricsModule],
  providers: [
    JobStoreService,
    ResultWriterService,
    JobManagerService,
    JobJanitorService,
  ],
  exports: [JobManagerService],
})
export class JobsModule {}
