import {
  CanActivate,
  ExecutionContext,
  Injectable,
  Logger,
  UnauthorizedException,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import type { FastifyRequest } from 'fastify';

/** Passes everything when BROWSER_API_KEY is unset. */
@Injectable()
export class ApiKeyGuard implements CanActivate {
  private readonly logger = new Logger(ApiKeyGuard.name);
  private readonly apiKey: string;

  constructor(private readonly configService: ConfigService) {
    this.apiKey = this.configService.get<string>('BROWSER_API_KEY') || '';
  }

  canActivate(context: ExecutionContext): boolean {
    if (!this.apiKey) return true;

    const request = context.switchToHttp().getRequest<FastifyRequest>();
    const header = request.headers['x-api-key'];
    const providedKey = Array.isArray(header) ? header[0] : header;

    if (!providedKey) {
      this.logger.warn('Missing API key in request');
      throw new UnauthorizedException('API key required');
    }
    if (providedKey !== this.apiKey) {
      this.logger.warn(`Invalid API key from ${request.ip}`);
      throw new UnauthorizedException('Invalid API key');
    }
    return true;
  }
}
