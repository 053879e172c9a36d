import { Injectable } from '@nestjs/common';
import { InvalidParamsError } from '@/shared/common/errors/scrape.errors';
import {
  ScrapeTask,
  TaskContext,
  TaskParams,
} from '../interfaces/task.interface';
import { parseParams } from '../lib/parse-params';
import { GithubRepoParamsDto } from './dto/github-repo-params.dto';
import { GithubApiClient } from './github-api.client';
import { GithubRepoInput, GithubRepoResult, RepoRef } from './github-repo.types';

const DEFAULT_MAX_RELEASES = 10;
const SEGMENT = /^[A-Za-z0-9_.-]+$/;

/** Accepts `owner/name` or any github.com URL pointing into the repository. */
export function parseRepoRef(value: string): RepoRef | undefined {
  const trimmed = value.trim();
  let path = trimmed;

  if (/^https?:\/\//i.test(trimmed) || trimmed.startsWith('github.com/')) {
    let url: URL;
    try {
      url = new URL(trimmed.startsWith('http') ? trimmed : `https://${trimmed}`);
    } catch {
      return undefined;
    }
    if (!/(^|\.)github\.com$/i.test(url.hostname)) return undefined;
    path = url.pathname;
  }

  const [owner, rawName] = path.split('/').filter((part) => part.length > 0);
  if (!owner || !rawName) return undefined;

  const name = rawName.replace(/\.git$/i, '');
  if (!SEGMENT.test(owner) || !SEGMENT.test(name)) return undefined;
  return { owner, name };
}

@Injectable()
export class GithubRepoTask
  implements ScrapeTask<GithubRepoInput, GithubRepoResult>
{
  readonly name = 'github-repo';
  readonly description = 'Repository metadata and releases from the GitHub API';

  constructor(private readonly github: GithubApiClient) {}

  parseParams(params: TaskParams): GithubRepoInput {
    const dto = parseParams(GithubRepoParamsDto, params);
    const repo = parseRepoRef(dto.repo);
    if (!repo) {
      throw new InvalidParamsError([
        'repo must be "owner/name" or a github.com repository URL',
      ]);
    }
    return {
      repo,
      includeReleases: dto.include_releases ?? true,
      maxReleases: dto.max_releases ?? DEFAULT_MAX_RELEASES,
    };
  }

  async run(
    input: GithubRepoInput,
    { logger, signal }: TaskContext,
  ): Promise<GithubRepoResult> {
    const { owner, name } = input.repo;
    logger.log(`Fetching ${owner}/${name}`);

    const repository = await this.github.getRepository(input.repo, signal);
    const releases = input.includeReleases
      ? await this.github.getReleases(input.repo, input.maxReleases, signal)
      : undefined;

    logger.log(
      `${repository.fullName}: ${repository.stars} stars${releases ? `, ${releases.length} releases` : ''}`,
    );

    return {
      repository,
      ...(releases ? { releases } : {}),
      fetchedAt: new Date().toISOString(),
    };
  }
}
