import { Logger, Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import type { BrowserSession } from '@/shared/browser/interfaces/browser-session.interface';
import { ExtractionModule } from '@/shared/extraction/extraction.module';
import { BookingHotelsTask } from './booking/booking-hotels.task';
import {
  BOOKING_SITE_FACTORY,
  BookingSiteFactory,
} from './booking/booking-site.interface';
import { PlaywrightBookingSite } from './booking/playwright-booking.site';
import { GithubApiClient } from './github-repo/github-api.client';
import { GithubRepoTask } from './github-repo/github-repo.task';
import { SCRAPE_TASKS, ScrapeTask } from './interfaces/task.interface';
import { OpenDataApiClient } from './open-data/open-data-api.client';
import { OpenDataTask } from './open-data/open-data.task';
import { ScrapeSiteTask } from './scrape-site/scrape-site.task';
import { TaskRegistryService } from './services/task-registry.service';

@Module({
  imports: [ConfigModule, ExtractionModule],
  providers: [
    {
      provide: BOOKING_SITE_FACTORY,
      useFactory: (configService: ConfigService): BookingSiteFactory => {
        const navigation = {
          timeoutMs:
            configService.get<number>('NAVIGATION_TIMEOUT_MS') ?? 30000,
          attempts: configService.get<number>('NAVIGATION_ATTEMPTS') ?? 3,
        };
        return (session: BrowserSession, logger: Logger) =>
          new PlaywrightBookingSite(session, navigation, logger);
      },
      inject: [ConfigService],
    },
    GithubApiClient,
    OpenDataApiClient,
    BookingHotelsTask,
    ScrapeSiteTask,
    GithubRepoTask,
    OpenDataTask,
    {
      provide: SCRAPE_TASKS,
      useFactory: (...tasks: ScrapeTask[]) => tasks,
      inject: [BookingHotelsTask, ScrapeSiteTask, GithubRepoTask, OpenDataTask],
    },
    TaskRegistryService,
  ],
  exports: [TaskRegistryService],
})
export class TasksModule {}
