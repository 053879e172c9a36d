import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { BrowserRuntimeService } from './services/browser-runtime.service';
import { BrowserHealthService } from './services/browser-health.service';
import { BROWSER_SESSION_PROVIDER } from './interfaces/browser-session.interface';

@Module({
  imports: [ConfigModule],
  providers: [
    BrowserRuntimeService,
    BrowserHealthService,
    {
      provide: BROWSER_SESSION_PROVIDER,
      useExisting: BrowserRuntimeService,
    },
  ],
  exports: [BrowserRuntimeService, BROWSER_SESSION_PROVIDER],
})
export class BrowserModule {}
