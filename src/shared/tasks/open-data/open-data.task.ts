import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { mkdir, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import * as path from 'path';
import { errors as undiciErrors } from 'undici';
import type { BrowserSession } from '@/shared/browser/interfaces/browser-session.interface';
import { NavigationOptions, gotoWithRetry } from '@/shared/browser/navigation';
import {
  InvalidParamsError,
  errorMessage,
} from '@/shared/common/errors/scrape.errors';
import { sleep } from '@/shared/lib/util';
import {
  ScrapeTask,
  TaskContext,
  TaskParams,
} from '../interfaces/task.interface';
import { parseParams } from '../lib/parse-params';
import { OpenDataParamsDto } from './dto/open-data-params.dto';
import {
  OpenDataApiClient,
  PortalDownload,
  PortalRequestOptions,
  resourcesPageUrl,
  v1DownloadUrl,
} from './open-data-api.client';
import {
  OPEN_DATA_BASE_URL,
  classifyPayload,
  deriveFileName,
  finalFileName,
  safeFileName,
  saveDownload,
  uniqueFileName,
} from './open-data-files';
import {
  DatasetResult,
  DatasetStatus,
  DownloadAttempt,
  DownloadOutcome,
  DownloadStage,
  DownloadedFile,
  OpenDataInput,
  OpenDataResource,
  OpenDataResult,
  PublisherResult,
} from './open-data.types';

export const OPEN_DATA_TASK_NAME = 'saudi-open-data';

const FILE_SAMPLE_SIZE = 20;
const WARM_SETTLE_MS = 400;

/** Failures the portal's WAF or gateway produce; a cookie warm-up may clear them. */
const TRANSIENT_REASONS = new Set([
  'timeout',
  'html_interstitial',
  'empty',
  'http_403',
  'http_429',
  'http_502',
  'http_503',
  'http_504',
  'http_522',
]);

/** Per-dataset download state shared by the resources of one dataset. */
interface DatasetRun {
  datasetId: string;
  session: BrowserSession;
  downloadsDir: string;
  usedNames: Set<string>;
  request: PortalRequestOptions;
  warmed: boolean;
}

@Injectable()
export class OpenDataTask implements ScrapeTask<OpenDataInput, OpenDataResult> {
  readonly name = OPEN_DATA_TASK_NAME;
  readonly description =
    'Downloads dataset resources from the Saudi open data portal, by dataset or publisher';

  private readonly outputRoot: string;
  private readonly requestDelayMs: number;
  private readonly navigation: NavigationOptions;

  constructor(
    private readonly configService: ConfigService,
    private readonly portal: OpenDataApiClient,
  ) {
    this.outputRoot =
      this.configService.get<string>('OUTPUT_ROOT') ||
      path.join(tmpdir(), 'scrape-jobs');
    this.requestDelayMs =
      this.configService.get<number>('OPEN_DATA_REQUEST_DELAY_MS') ?? 800;
    this.navigation = {
      timeoutMs: this.configService.get<number>('NAVIGATION_TIMEOUT_MS') ?? 30000,
      attempts: this.configService.get<number>('NAVIGATION_ATTEMPTS') ?? 3,
    };
  }

  parseParams(params: TaskParams): OpenDataInput {
    const dto = parseParams(OpenDataParamsDto, params);
    if (dto.dataset_id !== undefined && dto.publisher_id !== undefined) {
      throw new InvalidParamsError([
        'provide either dataset_id or publisher_id, not both',
      ]);
    }

    if (dto.dataset_id !== undefined) {
      return {
        mode: 'dataset',
        datasetId: dto.dataset_id,
        ...(dto.max_resources ? { maxResources: dto.max_resources } : {}),
      };
    }

    let range: [number, number] | undefined;
    if (dto.dataset_range) {
      const [first, last] = dto.dataset_range;
      if (first > last) {
        throw new InvalidParamsError([
          'dataset_range must be [first, last] with first <= last',
        ]);
      }
      range = [first, last];
    }
    return {
      mode: 'publisher',
      publisherId: dto.publisher_id ?? '',
      ...(range ? { range } : {}),
      ...(dto.max_datasets ? { maxDatasets: dto.max_datasets } : {}),
      ...(dto.max_resources ? { maxResources: dto.max_resources } : {}),
    };
  }

  async run(input: OpenDataInput, context: TaskContext): Promise<OpenDataResult> {
    const jobDir = path.join(
      this.outputRoot,
      OPEN_DATA_TASK_NAME,
      safeFileName(context.jobId),
    );

    if (input.mode === 'dataset') {
      return this.runDataset(
        input.datasetId,
        null,
        jobDir,
        input.maxResources,
        context,
      );
    }
    return this.runPublisher(input, jobDir, context);
  }

  private async runPublisher(
    input: Extract<OpenDataInput, { mode: 'publisher' }>,
    jobDir: string,
    context: TaskContext,
  ): Promise<PublisherResult> {
    const { logger, signal } = context;
    const publisherDir = path.join(jobDir, input.publisherId);
    await mkdir(publisherDir, { recursive: true });

    let datasets = await this.portal.listPublisherDatasets(input.publisherId, {
      signal,
    });
    logger.log(`${input.publisherId}: ${datasets.length} datasets listed`);

    if (input.range) {
      const [first, last] = input.range;
      datasets = datasets.slice(first, last + 1);
    }
    if (input.maxDatasets) {
      datasets = datasets.slice(0, input.maxDatasets);
    }

    const results: DatasetResult[] = [];
    for (const [index, dataset] of datasets.entries()) {
      signal.throwIfAborted();
      if (index > 0) await this.pause();

      logger.log(
        `[${index + 1}/${datasets.length}] ${dataset.id}: ${dataset.title ?? 'untitled'}`,
      );
      try {
        results.push(
          await this.runDataset(
            dataset.id,
            dataset.title,
            publisherDir,
            input.maxResources,
            context,
          ),
        );
      } catch (error) {
        if (signal.aborted) throw error;
        logger.error(`${dataset.id}: dataset failed: ${errorMessage(error)}`);
        results.push(
          this.failedDataset(dataset.id, dataset.title, publisherDir, error),
        );
      }
    }

    const summaries = results.map(({ files: _files, ...summary }) => summary);
    await writeJson(path.join(publisherDir, 'publisher_results.json'), summaries);

    const result: PublisherResult = {
      publisherId: input.publisherId,
      totalDatasets: results.length,
      datasetsSucceeded: countStatus(results, 'success'),
      datasetsPartial: countStatus(results, 'partial'),
      datasetsFailed: countStatus(results, 'failed'),
      totalFilesOk: results.reduce((sum, r) => sum + r.downloaded, 0),
      totalFilesFailed: results.reduce((sum, r) => sum + r.failed, 0),
      outputDir: publisherDir,
      datasets: summaries,
    };
    logger.log(
      `${input.publisherId}: ${result.datasetsSucceeded} succeeded, ${result.datasetsPartial} partial, ${result.datasetsFailed} failed`,
    );
    return result;
  }

  private async runDataset(
    datasetId: string,
    knownTitle: string | null,
    parentDir: string,
    maxResources: number | undefined,
    { session, logger, signal }: TaskContext,
  ): Promise<DatasetResult> {
    const datasetDir = path.join(parentDir, safeFileName(datasetId));
    const downloadsDir = path.join(datasetDir, 'downloads');
    await mkdir(downloadsDir, { recursive: true });

    const run: DatasetRun = {
      datasetId,
      session,
      downloadsDir,
      usedNames: new Set(),
      request: { referer: resourcesPageUrl(datasetId), signal },
      warmed: false,
    };

    const metadata = await this.portal
      .getDatasetMetadata(datasetId, { signal })
      .catch((error: unknown) => {
        if (signal.aborted) throw error;
        logger.warn(`${datasetId}: dataset metadata unavailable: ${errorMessage(error)}`);
        return null;
      });

    let resources: OpenDataResource[];
    try {
      resources = await this.portal.getResources(datasetId, { signal });
    } catch (error) {
      if (signal.aborted || !metadata?.resources.length) throw error;
      logger.warn(
        `${datasetId}: resources API failed, using dataset metadata: ${errorMessage(error)}`,
      );
      resources = metadata.resources;
    }
    if (resources.length === 0 && metadata?.resources.length) {
      resources = metadata.resources;
    }
    if (maxResources) {
      resources = resources.slice(0, maxResources);
    }
    await writeJson(path.join(datasetDir, 'resources.json'), resources);

    const outcomes: DownloadOutcome[] = [];
    for (const [index, resource] of resources.entries()) {
      signal.throwIfAborted();
      if (index > 0) await this.pause();

      const outcome = await this.downloadResource(run, resource, logger);
      outcomes.push(outcome);
      if (outcome.status === 'ok') {
        logger.log(
          `${datasetId}: [${index + 1}/${resources.length}] ${outcome.file} (${outcome.size} bytes)`,
        );
      } else {
        logger.warn(
          `${datasetId}: [${index + 1}/${resources.length}] ${outcome.resourceName || outcome.resourceId} failed: ${outcome.reason}`,
        );
      }
    }
    await writeJson(path.join(datasetDir, 'downloads.json'), outcomes);

    const files = outcomes.flatMap((outcome) =>
      outcome.status === 'ok' ? [toDownloadedFile(outcome)] : [],
    );
    const failed = outcomes.length - files.length;

    return {
      datasetId,
      title: knownTitle ?? metadata?.title ?? null,
      url: resourcesPageUrl(datasetId),
      status: datasetStatus(files.length, failed),
      totalResources: resources.length,
      downloaded: files.length,
      failed,
      outputDir: datasetDir,
      files: files.slice(0, FILE_SAMPLE_SIZE),
    };
  }

  /**
   * Tries the versioned download endpoint, then the listed link. When a
   * failure looks like the WAF, warms cookies in a browser page and tries
   * the endpoint once more.
   */
  private async downloadResource(
    run: DatasetRun,
    resource: OpenDataResource,
    logger: Logger,
  ): Promise<DownloadOutcome> {
    const sources: { stage: DownloadStage; url: string }[] = [];
    if (resource.resourceId) {
      sources.push({
        stage: 'api-v1',
        url: v1DownloadUrl(run.datasetId, resource.resourceId),
      });
    }
    if (resource.downloadUrl) {
      sources.push({ stage: 'direct', url: resource.downloadUrl });
    }

    const attempts: DownloadAttempt[] = [];
    for (const source of sources) {
      const outcome = await this.tryDownload(run, resource, source.stage, source.url);
      if (outcome.status === 'ok') return outcome;
      attempts.push({ stage: source.stage, reason: outcome.reason });
    }

    const transient = attempts.some((attempt) =>
      TRANSIENT_REASONS.has(attempt.reason),
    );
    if (resource.resourceId && transient && !run.warmed) {
      await this.warmCookies(run, logger);
      const outcome = await this.tryDownload(
        run,
        resource,
        'api-v1-warmed',
        v1DownloadUrl(run.datasetId, resource.resourceId),
      );
      if (outcome.status === 'ok') return outcome;
      attempts.push({ stage: 'api-v1-warmed', reason: outcome.reason });
    }

    return {
      status: 'error',
      resourceId: resource.resourceId,
      resourceName: resource.name,
      reason: attempts.length
        ? attempts[attempts.length - 1].reason
        : 'no_download_link',
      attempts,
    };
  }

  private async tryDownload(
    run: DatasetRun,
    resource: OpenDataResource,
    stage: DownloadStage,
    url: string,
  ): Promise<DownloadOutcome> {
    const failure = (reason: string): DownloadOutcome => ({
      status: 'error',
      resourceId: resource.resourceId,
      resourceName: resource.name,
      reason,
      attempts: [{ stage, reason }],
    });

    let response: PortalDownload;
    try {
      response = await this.portal.download(url, run.request);
    } catch (error) {
      if (run.request.signal?.aborted) throw error;
      return failure(isTimeout(error) ? 'timeout' : errorMessage(error));
    }
    if (response.statusCode !== 200) {
      return failure(`http_${response.statusCode}`);
    }

    const kind = classifyPayload(response.body, response.contentType);
    const suggested = deriveFileName(
      resource,
      url,
      response.contentDisposition,
      response.contentType,
    );
    const fileName = finalFileName(suggested, resource, response.contentType, kind);
    const saved = await saveDownload(
      run.downloadsDir,
      kind === 'html_interstitial' || response.body.length === 0
        ? fileName
        : uniqueFileName(fileName, run.usedNames),
      response.body,
      kind,
    );
    if (!saved.ok) return failure(saved.reason);

    return {
      status: 'ok',
      resourceId: resource.resourceId,
      resourceName: resource.name,
      stage,
      file: saved.file,
      size: saved.size,
      sha256: saved.sha256,
      kind: saved.kind,
    };
  }

  /** Visits the portal like a reader would so its bot check sets cookies. */
  private async warmCookies(run: DatasetRun, logger: Logger): Promise<void> {
    run.warmed = true;
    const page = await run.session.newPage();
    try {
      await gotoWithRetry(page, `${OPEN_DATA_BASE_URL}/`, this.navigation, logger);
      await page.waitForTimeout(WARM_SETTLE_MS);
      await gotoWithRetry(
        page,
        resourcesPageUrl(run.datasetId),
        this.navigation,
        logger,
      );
      await page.waitForTimeout(WARM_SETTLE_MS);

      const cookies = await page.context().cookies(OPEN_DATA_BASE_URL);
      if (cookies.length > 0) {
        run.request.cookie = cookies
          .map((cookie) => `${cookie.name}=${cookie.value}`)
          .join('; ');
      }
      logger.log(`${run.datasetId}: warmed portal session, ${cookies.length} cookies`);
    } catch (error) {
      logger.warn(`${run.datasetId}: cookie warm-up failed: ${errorMessage(error)}`);
    } finally {
      await page.close();
    }
  }

  private failedDataset(
    datasetId: string,
    title: string | null,
    parentDir: string,
    error: unknown,
  ): DatasetResult {
    return {
      datasetId,
      title,
      url: resourcesPageUrl(datasetId),
      status: 'failed',
      totalResources: 0,
      downloaded: 0,
      failed: 0,
      outputDir: path.join(parentDir, safeFileName(datasetId)),
      files: [],
      error: errorMessage(error),
    };
  }

  private async pause(): Promise<void> {
    if (this.requestDelayMs > 0) {
      await sleep(this.requestDelayMs);
    }
  }
}

function isTimeout(error: unknown): boolean {
  return (
    error instanceof undiciErrors.HeadersTimeoutError ||
    error instanceof undiciErrors.BodyTimeoutError ||
    error instanceof undiciErrors.ConnectTimeoutError
  );
}

function datasetStatus(downloaded: number, failed: number): DatasetStatus {
  if (failed === 0) return 'success';
  return downloaded === 0 ? 'failed' : 'partial';
}

function countStatus(results: DatasetResult[], status: DatasetStatus): number {
  return results.filter((result) => result.status === status).length;
}

function toDownloadedFile({
  status: _status,
  ...file
}: Extract<DownloadOutcome, { status: 'ok' }>): DownloadedFile {
  return file;
}

async function writeJson(file: string, data: unknown): Promise<void> {
  await writeFile(file, JSON.stringify(data, null, 2), 'utf8');
}
