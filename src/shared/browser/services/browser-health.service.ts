import { Injectable, Logger } from '@nestjs/common';
import { Cron, CronExpression } from '@nestjs/schedule';
import { errorMessage } from '@/shared/common/errors/scrape.errors';
import { BrowserRuntimeService } from './browser-runtime.service';

@Injectable()
export class BrowserHealthService {
  private readonly logger = new Logger(BrowserHealthService.name);

  constructor(private readonly runtime: BrowserRuntimeService) {}

  @Cron(CronExpression.EVERY_30_SECONDS)
  async performHealthCheck(): Promise<void> {
    const stats = this.runtime.getRuntimeStats();

    this.logger.debug(
      `Browser runtime: connected=${stats.connected}, ${stats.activeSessions} active sessions, ${stats.sessionsOpened} opened, ${stats.relaunches} relaunches`,
    );

    if (stats.connected) return;

    try {
      await this.runtime.relaunch();
    } catch (error) {
      this.logger.error(`Browser relaunch failed: ${errorMessage(error)}`);
    }
  }
}
