import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { request } from 'undici';
import { UpstreamRequestError } from '@/shared/common/errors/scrape.errors';
import { isPlainObject } from '@/shared/lib/util';
import {
  OPEN_DATA_BASE_URL,
  classifyPayload,
  normalizeDownloadUrl,
} from './open-data-files';
import { OpenDataResource, PublisherDataset } from './open-data.types';

export const OPEN_DATA_USER_AGENT =
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/126.0.0.0 Safari/537.36';

export interface PortalRequestOptions {
  /** `Cookie` header value collected from a warmed browser page. */
  cookie?: string;
  referer?: string;
  signal?: AbortSignal;
}

export interface DatasetMetadata {
  title: string | null;
  resources: OpenDataResource[];
}

export interface PortalDownload {
  statusCode: number;
  contentType: string | null;
  contentDisposition: string | null;
  body: Buffer;
}

type Json = Record<string, unknown>;

export function resourcesPageUrl(datasetId: string): string {
  return `${OPEN_DATA_BASE_URL}/en/datasets/view/${datasetId}/resources`;
}

export function v1DownloadUrl(datasetId: string, resourceId: string): string {
  return `${OPEN_DATA_BASE_URL}/data/api/v1/datasets/${encodeURIComponent(datasetId)}/resources/${encodeURIComponent(resourceId)}/download`;
}

/** Client for the JSON API behind the national open data portal. */
@Injectable()
export class OpenDataApiClient {
  private readonly logger = new Logger(OpenDataApiClient.name);
  private readonly timeoutMs: number;

  constructor(private readonly configService: ConfigService) {
    this.timeoutMs =
      this.configService.get<number>('NAVIGATION_TIMEOUT_MS') ?? 30000;
  }

  /** An unknown publisher reads as an empty catalogue. */
  async listPublisherDatasets(
    publisherId: string,
    options: PortalRequestOptions = {},
  ): Promise<PublisherDataset[]> {
    let data: unknown;
    try {
      data = await this.getJson(
        `/data/api/organizations?version=-1&organization=${encodeURIComponent(publisherId)}`,
        options,
      );
    } catch (error) {
      if (error instanceof UpstreamRequestError && error.statusCode === 404) {
        this.logger.warn(`Publisher ${publisherId} not found`);
        return [];
      }
      throw error;
    }

    const datasets = isPlainObject(data) ? data.datasets : undefined;
    if (!Array.isArray(datasets)) return [];

    return datasets.filter(isPlainObject).flatMap((item) => {
      const id = stringField(item, 'id') ?? stringField(item, 'datasetId');
      return id ? [{ id, title: titleOf(item) }] : [];
    });
  }

  async getResources(
    datasetId: string,
    options: PortalRequestOptions = {},
  ): Promise<OpenDataResource[]> {
    const data = await this.getJson(
      `/data/api/datasets/resources?version=-1&dataset=${encodeURIComponent(datasetId)}`,
      options,
    );
    return isPlainObject(data) ? parseResources(data.resources) : [];
  }

  async getDatasetMetadata(
    datasetId: string,
    options: PortalRequestOptions = {},
  ): Promise<DatasetMetadata> {
    const data = await this.getJson(
      `/data/api/datasets?version=-1&dataset=${encodeURIComponent(datasetId)}`,
      options,
    );
    if (!isPlainObject(data)) return { title: null, resources: [] };
    return { title: titleOf(data), resources: parseResources(data.resources) };
  }

  /** Non-200 answers are returned, not thrown; callers record them as attempts. */
  async download(
    url: string,
    options: PortalRequestOptions = {},
  ): Promise<PortalDownload> {
    this.logger.debug(`GET ${url}`);
    const response = await request(url, {
      method: 'GET',
      headers: this.headers(options, '*/*'),
      headersTimeout: this.timeoutMs,
      bodyTimeout: this.timeoutMs,
      maxRedirections: 5,
      signal: options.signal,
    });

    if (response.statusCode !== 200) {
      await response.body.dump();
      return {
        statusCode: response.statusCode,
        contentType: null,
        contentDisposition: null,
        body: Buffer.alloc(0),
      };
    }
    return {
      statusCode: response.statusCode,
      contentType: headerValue(response.headers, 'content-type'),
      contentDisposition: headerValue(response.headers, 'content-disposition'),
      body: Buffer.from(await response.body.arrayBuffer()),
    };
  }

  private async getJson(
    path: string,
    options: PortalRequestOptions,
  ): Promise<unknown> {
    const url = `${OPEN_DATA_BASE_URL}${path}`;
    this.logger.debug(`GET ${url}`);
    const response = await request(url, {
      method: 'GET',
      headers: this.headers(options, 'application/json'),
      headersTimeout: this.timeoutMs,
      bodyTimeout: this.timeoutMs,
      signal: options.signal,
    });

    if (response.statusCode >= 400) {
      await response.body.dump();
      throw new UpstreamRequestError(
        response.statusCode,
        `Open data API responded ${response.statusCode} for ${path}`,
      );
    }

    const text = await response.body.text();
    if (classifyPayload(Buffer.from(text)) === 'html_interstitial') {
      throw new UpstreamRequestError(
        503,
        `Open data API answered ${path} with a bot-check page`,
      );
    }
    try {
      return JSON.parse(text);
    } catch {
      throw new UpstreamRequestError(
        502,
        `Open data API returned malformed JSON for ${path}`,
      );
    }
  }

  private headers(
    { cookie, referer }: PortalRequestOptions,
    accept: string,
  ): Record<string, string> {
    const headers: Record<string, string> = {
      accept,
      'user-agent': OPEN_DATA_USER_AGENT,
    };
    if (cookie) headers.cookie = cookie;
    if (referer) headers.referer = referer;
    return headers;
  }
}

function parseResources(value: unknown): OpenDataResource[] {
  if (!Array.isArray(value)) return [];

  return value.filter(isPlainObject).map((item) => {
    const link = stringField(item, 'downloadUrl') ?? stringField(item, 'url');
    return {
      resourceId:
        stringField(item, 'resourceID') ?? stringField(item, 'id') ?? '',
      name:
        stringField(item, 'name') ??
        stringField(item, 'titleEn') ??
        stringField(item, 'titleAr') ??
        '',
      format: stringField(item, 'format'),
      downloadUrl: link ? normalizeDownloadUrl(link) : null,
    };
  });
}

function titleOf(item: Json): string | null {
  return (
    stringField(item, 'titleEn') ??
    stringField(item, 'titleAr') ??
    stringField(item, 'title') ??
    stringField(item, 'name')
  );
}

/** Empty strings count as missing; the portal uses them for blank fields. */
function stringField(data: Json, key: string): string | null {
  const value = data[key];
  return typeof value === 'string' && value.trim() ? value : null;
}

function headerValue(
  headers: Record<string, string | string[] | undefined>,
  name: string,
): string | null {
  const value = headers[name];
  if (Array.isArray(value)) return value[0] ?? null;
  return value ?? null;
}
