import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { request } from 'undici';
import { UpstreamRequestError } from '@/shared/common/errors/scrape.errors';
import { isPlainObject } from '@/shared/lib/util';
import {
  GithubRelease,
  GithubRepoMetadata,
  RepoRef,
} from './github-repo.types';

export const GITHUB_API_URL = 'https://api.github.com';

type Json = Record<string, unknown>;

@Injectable()
export class GithubApiClient {
  private readonly logger = new Logger(GithubApiClient.name);
  private readonly token: string;
  private readonly timeoutMs: number;

  constructor(private readonly configService: ConfigService) {
    this.token = this.configService.get<string>('GITHUB_TOKEN') || '';
    this.timeoutMs =
      this.configService.get<number>('NAVIGATION_TIMEOUT_MS') ?? 30000;
  }

  async getRepository(
    { owner, name }: RepoRef,
    signal?: AbortSignal,
  ): Promise<GithubRepoMetadata> {
    const data = await this.get(`/repos/${owner}/${name}`, signal);
    if (!isPlainObject(data)) {
      throw new UpstreamRequestError(502, 'GitHub returned a malformed repository');
    }

    const license = data.license;
    return {
      name: stringField(data, 'name') ?? name,
      fullName: stringField(data, 'full_name') ?? `${owner}/${name}`,
      description: stringField(data, 'description'),
      language: stringField(data, 'language'),
      stars: numberField(data, 'stargazers_count'),
      forks: numberField(data, 'forks_count'),
      openIssues: numberField(data, 'open_issues_count'),
      createdAt: stringField(data, 'created_at'),
      updatedAt: stringField(data, 'updated_at'),
      cloneUrl: stringField(data, 'clone_url'),
      homepage: stringField(data, 'homepage') || null,
      topics: Array.isArray(data.topics)
        ? data.topics.filter((topic): topic is string => typeof topic === 'string')
        : [],
      license: isPlainObject(license) ? stringField(license, 'name') : null,
    };
  }

  async getReleases(
    { owner, name }: RepoRef,
    limit: number,
    signal?: AbortSignal,
  ): Promise<GithubRelease[]> {
    const data = await this.get(
      `/repos/${owner}/${name}/releases?per_page=${limit}`,
      signal,
    );
    if (!Array.isArray(data)) {
      throw new UpstreamRequestError(502, 'GitHub returned malformed releases');
    }

    return data.filter(isPlainObject).map((release) => ({
      tagName: stringField(release, 'tag_name') ?? '',
      name: stringField(release, 'name'),
      publishedAt: stringField(release, 'published_at'),
      prerelease: release.prerelease === true,
      url: stringField(release, 'html_url'),
    }));
  }

  private async get(path: string, signal?: AbortSignal): Promise<unknown> {
    const headers: Record<string, string> = {
      Accept: 'application/vnd.github+json',
      'User-Agent': 'scrape-jobs-service',
      'X-GitHub-Api-Version': '2022-11-28',
    };
    if (this.token) {
      headers.Authorization = `Bearer ${this.token}`;
    }

    const url = `${GITHUB_API_URL}${path}`;
    this.logger.debug(`GET ${url}`);
    const response = await request(url, {
      method: 'GET',
      headers,
      headersTimeout: this.timeoutMs,
      bodyTimeout: this.timeoutMs,
      signal,
    });

    if (response.statusCode >= 400) {
      await response.body.dump();
      throw new UpstreamRequestError(
        response.statusCode,
        describeStatus(response.statusCode, path),
      );
    }
    return response.body.json();
  }
}

function describeStatus(statusCode: number, path: string): string {
  switch (statusCode) {
    case 404:
      return `GitHub resource ${path} not found`;
    case 401:
      return 'GitHub rejected the configured token';
    case 403:
    case 429:
      return 'GitHub API rate limit exceeded';
    default:
      return `GitHub API responded ${statusCode} for ${path}`;
  }
}

function stringField(data: Json, key: string): string | null {
  const value = data[key];
  return typeof value === 'string' ? value : null;
}

function numberField(data: Json, key: string): number {
  const value = data[key];
  return typeof value === 'number' && Number.isFinite(value) ? value : 0;
}
