import {
  Injectable,
  Logger,
  OnModuleInit,
  OnModuleDestroy,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { chromium, Browser, BrowserContext } from 'playwright';
import { v4 as uuidv4 } from 'uuid';
import { errorMessage } from '@/shared/common/errors/scrape.errors';
import {
  BrowserRuntimeStats,
  BrowserSession,
  BrowserSessionProvider,
  SessionOptions,
} from '../interfaces/browser-session.interface';

const DEFAULT_USER_AGENT =
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/119.0.0.0 Safari/537.36';

@Injectable()
export class BrowserRuntimeService
  implements BrowserSessionProvider, OnModuleInit, OnModuleDestroy
{
  private readonly logger = new Logger(BrowserRuntimeService.name);
  private readonly contexts: Map<string, BrowserContext> = new Map();
  private readonly headless: boolean;
  private browser: Browser | null = null;
  private launching: Promise<Browser> | null = null;
  private launchedAt: Date | null = null;
  private sessionsOpened = 0;
  private relaunches = 0;

  constructor(private readonly configService: ConfigService) {
    this.headless =
      this.configService.get<boolean>('BROWSER_HEADLESS') !== false;
  }

  async onModuleInit() {
    this.logger.log(`Starting Chromium (headless: ${this.headless})`);
    await this.ensureBrowser();
  }

  async onModuleDestroy() {
    this.logger.log('Shutting down browser runtime...');

    for (const [id, context] of this.contexts.entries()) {
      try {
        await context.close();
      } catch (error) {
        this.logger.error(
          `Failed to close session ${id}: ${errorMessage(error)}`,
        );
      }
    }
    this.contexts.clear();

    if (this.browser) {
      try {
        await this.browser.close();
      } catch (error) {
        this.logger.error(`Failed to close browser: ${errorMessage(error)}`);
      }
      this.browser = null;
    }

    this.logger.log('Browser runtime shutdown complete');
  }

  isConnected(): boolean {
    return this.browser?.isConnected() ?? false;
  }

  async relaunch(): Promise<void> {
    this.logger.warn('Relaunching Chromium');
    await this.ensureBrowser();
  }

  async openSession({
    jobId,
    userAgent,
  }: SessionOptions): Promise<BrowserSession> {
    const browser = await this.ensureBrowser();

    const context = await browser.newContext({
      userAgent: userAgent || DEFAULT_USER_AGENT,
      viewport: { width: 1920, height: 1080 },
      deviceScaleFactor: 1,
      locale: 'en-US',
      extraHTTPHeaders: {
        'Accept-Language': 'en-US,en;q=0.9',
        'upgrade-insecure-requests': '1',
      },
    });

    // Mask automation footprint
    await context.addInitScript(() => {
      Object.defineProperty(navigator, 'webdriver', {
        get: () => undefined,
      });
    });

    const sessionId = uuidv4();
    this.contexts.set(sessionId, context);
    this.sessionsOpened++;
    this.logger.debug(`Opened session ${sessionId} for job ${jobId}`);

    return {
      id: sessionId,
      jobId,
      newPage: () => context.newPage(),
      close: async () => {
        if (!this.contexts.delete(sessionId)) return;
        await context.close();
        this.logger.debug(`Closed session ${sessionId} for job ${jobId}`);
      },
    };
  }

  getRuntimeStats(): BrowserRuntimeStats {
    return {
      connected: this.isConnected(),
      headless: this.headless,
      activeSessions: this.contexts.size,
      sessionsOpened: this.sessionsOpened,
      relaunches: this.relaunches,
      launchedAt: this.launchedAt,
    };
  }

  private ensureBrowser(): Promise<Browser> {
    if (this.browser?.isConnected()) {
      return Promise.resolve(this.browser);
    }

    if (!this.launching) {
      this.launching = this.launch().finally(() => {
        this.launching = null;
      });
    }
    return this.launching;
  }

  private async launch(): Promise<Browser> {
    if (this.browser) {
      this.relaunches++;
      // Contexts of a dead browser are gone with it
      this.contexts.clear();
    }

    try {
      const browser = await chromium.launch({
        headless: this.headless,
        args: [
          '--no-sandbox',
          '--disable-setuid-sandbox',
          '--disable-blink-features=AutomationControlled',
          '--disable-infobars',
          '--disable-dev-shm-usage',
        ],
      });

      browser.on('disconnected', () => {
        this.logger.warn('Chromium disconnected');
      });

      this.browser = browser;
      this.launchedAt = new Date();
      this.logger.log('Chromium launched successfully');
      return browser;
    } catch (error) {
      this.logger.error(`Failed to launch Chromium: ${errorMessage(error)}`);
      throw error;
    }
  }
}
