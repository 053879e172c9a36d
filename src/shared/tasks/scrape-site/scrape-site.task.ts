import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { NavigationOptions, gotoWithRetry } from '@/shared/browser/navigation';
import {
  ScrapeTask,
  TaskContext,
  TaskParams,
} from '../interfaces/task.interface';
import { parseParams } from '../lib/parse-params';
import { ScrapeSiteParamsDto } from './dto/scrape-site-params.dto';

const DEFAULT_MAX_LINKS = 100;
const MAX_TEXT_LENGTH = 20_000;
const SELECTOR_TIMEOUT_MS = 10_000;
const SCROLL = {
  distance: 600,
  delayMs: 400,
  finalDelayMs: 500,
} as const;

export interface ScrapeSiteInput {
  url: string;
  waitForSelector?: string;
  scrollIterations: number;
  maxLinks: number;
}

export interface PageLink {
  href: string;
  text: string;
}

export interface ScrapeSiteResult {
  requestedUrl: string;
  finalUrl: string;
  title: string;
  text: string;
  textTruncated: boolean;
  links: PageLink[];
  bytes: number;
  durationMs: number;
  scrapedAt: string;
}

@Injectable()
export class ScrapeSiteTask
  implements ScrapeTask<ScrapeSiteInput, ScrapeSiteResult>
{
  readonly name = 'scrape-site';
  readonly description = 'Captures title, visible text and links of one page';

  private readonly navigation: NavigationOptions;

  constructor(private readonly configService: ConfigService) {
    this.navigation = {
      timeoutMs: this.configService.get<number>('NAVIGATION_TIMEOUT_MS') ?? 30000,
      attempts: this.configService.get<number>('NAVIGATION_ATTEMPTS') ?? 3,
    };
  }

  parseParams(params: TaskParams): ScrapeSiteInput {
    const dto = parseParams(ScrapeSiteParamsDto, params);
    return {
      url: dto.url,
      ...(dto.wait_for_selector
        ? { waitForSelector: dto.wait_for_selector }
        : {}),
      scrollIterations: dto.scroll_iterations ?? 0,
      maxLinks: dto.max_links ?? DEFAULT_MAX_LINKS,
    };
  }

  async run(
    input: ScrapeSiteInput,
    { session, logger }: TaskContext,
  ): Promise<ScrapeSiteResult> {
    const startTime = Date.now();
    const page = await session.newPage();

    await gotoWithRetry(page, input.url, this.navigation, logger);

    if (input.waitForSelector) {
      try {
        await page.waitForSelector(input.waitForSelector, {
          timeout: SELECTOR_TIMEOUT_MS,
        });
      } catch {
        logger.warn(
          `Selector ${input.waitForSelector} not found, proceeding anyway`,
        );
      }
    }

    if (input.scrollIterations > 0) {
      logger.log(`Scrolling ${input.scrollIterations} times`);
      await page.evaluate(
        async ({ iterations, distance, delayMs, finalDelayMs }) => {
          for (let i = 0; i < iterations; i++) {
            window.scrollBy(0, distance);
            await new Promise((r) => setTimeout(r, delayMs));
          }
          window.scrollTo(0, document.body.scrollHeight);
          await new Promise((r) => setTimeout(r, finalDelayMs));
        },
        { iterations: input.scrollIterations, ...SCROLL },
      );
    }

    const html = await page.content();
    const title = await page.title();
    const fullText = (await page.locator('body').innerText()).trim();
    const links = await page.$$eval(
      'a[href]',
      (anchors, limit) =>
        anchors.slice(0, limit).map((anchor) => ({
          href: (anchor instanceof HTMLAnchorElement
            ? anchor.href
            : anchor.getAttribute('href')) ?? '',
          text: (anchor.textContent ?? '').trim(),
        })),
      input.maxLinks,
    );

    const durationMs = Date.now() - startTime;
    const bytes = Buffer.byteLength(html, 'utf8');
    logger.log(`Captured ${input.url}: ${bytes} bytes in ${durationMs}ms`);

    return {
      requestedUrl: input.url,
      finalUrl: page.url(),
      title,
      text: fullText.slice(0, MAX_TEXT_LENGTH),
      textTruncated: fullText.length > MAX_TEXT_LENGTH,
      links: links
        .filter((link) => link.href.length > 0)
        .slice(0, input.maxLinks),
      bytes,
      durationMs,
      scrapedAt: new Date().toISOString(),
    };
  }
}
