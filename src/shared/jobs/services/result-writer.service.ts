import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { mkdir, writeFile } from 'fs/promises';
import * as path from 'path';
import { RESULT_FILE_NAME } from '../jobs.constants';

@Injectable()
export class ResultWriterService {
  private readonly logger = new Logger(ResultWriterService.name);
  private readonly outputRoot: string;

  constructor(private readonly configService: ConfigService) {
    this.outputRoot = this.configService.get<string>('OUTPUT_ROOT') || '';
  }

  isEnabled(): boolean {
    return this.outputRoot.length > 0;
  }

  /** Returns the written path, or null when result files are off. */
  async write(
    taskName: string,
    jobId: string,
    result: object,
  ): Promise<string | null> {
    if (!this.isEnabled()) return null;

    const dir = path.join(
      this.outputRoot,
      safeSegment(taskName),
      safeSegment(jobId),
    );
    await mkdir(dir, { recursive: true });

    const file = path.join(dir, RESULT_FILE_NAME);
    await writeFile(file, JSON.stringify(result, null, 2), 'utf8');
    this.logger.debug(`Wrote result of job ${jobId} to ${file}`);
    return file;
  }
}

function safeSegment(value: string): string {
  return value.replace(/[^a-zA-Z0-9_-]/g, '_');
}
