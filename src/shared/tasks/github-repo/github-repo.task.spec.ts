import { Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Test } from '@nestjs/testing';
import {
  Dispatcher,
  MockAgent,
  getGlobalDispatcher,
  setGlobalDispatcher,
} from 'undici';
import type { BrowserSession } from '@/shared/browser/interfaces/browser-session.interface';
import {
  InvalidParamsError,
  ScrapeErrorKind,
  UpstreamRequestError,
  classifyError,
} from '@/shared/common/errors/scrape.errors';
import { TaskContext } from '../interfaces/task.interface';
import { GITHUB_API_URL, GithubApiClient } from './github-api.client';
import { GithubRepoTask, parseRepoRef } from './github-repo.task';

describe('parseRepoRef', () => {
  it.each([
    ['octo-org/widgets', { owner: 'octo-org', name: 'widgets' }],
    ['https://github.com/octo-org/widgets', { owner: 'octo-org', name: 'widgets' }],
    ['https://github.com/octo-org/widgets.git', { owner: 'octo-org', name: 'widgets' }],
    ['github.com/octo-org/widgets/tree/main/src', { owner: 'octo-org', name: 'widgets' }],
  ])('parses %s', (value, expected) => {
    expect(parseRepoRef(value)).toEqual(expected);
  });

  it.each(['widgets', 'https://gitlab.com/octo-org/widgets', 'octo org/widgets'])(
    'rejects %s',
    (value) => {
      expect(parseRepoRef(value)).toBeUndefined();
    },
  );
});

describe('GithubRepoTask', () => {
  let agent: MockAgent;
  let previousDispatcher: Dispatcher;
  let task: GithubRepoTask;
  let context: TaskContext;

  beforeEach(async () => {
    previousDispatcher = getGlobalDispatcher();
    agent = new MockAgent();
    agent.disableNetConnect();
    setGlobalDispatcher(agent);

    const moduleRef = await Test.createTestingModule({
      providers: [
        GithubRepoTask,
        GithubApiClient,
        {
          provide: ConfigService,
          useValue: new ConfigService({ GITHUB_TOKEN: 'test-token' }),
        },
      ],
    }).compile();
    task = moduleRef.get(GithubRepoTask);

    const session: BrowserSession = {
      id: 'session-1',
      jobId: 'job-1',
      newPage: jest.fn(),
      close: jest.fn(async () => undefined),
    };
    context = {
      jobId: 'job-1',
      session,
      logger: new Logger('test'),
      signal: new AbortController().signal,
    };
  });

  afterEach(async () => {
    setGlobalDispatcher(previousDispatcher);
    await agent.close();
  });

  it('validates params', () => {
    expect(task.parseParams({ repo: 'octo-org/widgets' })).toEqual({
      repo: { owner: 'octo-org', name: 'widgets' },
      includeReleases: true,
      maxReleases: 10,
    });
    expect(() => task.parseParams({})).toThrow(InvalidParamsError);
    expect(() => task.parseParams({ repo: 'nope' })).toThrow(
      'Invalid task parameters: repo must be "owner/name" or a github.com repository URL',
    );
  });

  it('collects metadata and releases', async () => {
    const github = agent.get(GITHUB_API_URL);
    github
      .intercept({ path: '/repos/octo-org/widgets', method: 'GET' })
      .reply(200, {
        name: 'widgets',
        full_name: 'octo-org/widgets',
        description: 'Widget toolkit',
        language: 'TypeScript',
        stargazers_count: 42,
        forks_count: 7,
        open_issues_count: 3,
        created_at: '2024-01-02T00:00:00Z',
        updated_at: '2026-10-01T00:00:00Z',
        clone_url: 'https://github.com/octo-org/widgets.git',
        homepage: '',
        topics: ['ui', 'widgets'],
        license: { name: 'MIT License' },
      });
    github
      .intercept({ path: '/repos/octo-org/widgets/releases?per_page=2', method: 'GET' })
      .reply(200, [
        {
          tag_name: 'v2.0.0',
          name: 'Two',
          published_at: '2026-09-01T00:00:00Z',
          prerelease: false,
          html_url: 'https://github.com/octo-org/widgets/releases/tag/v2.0.0',
        },
        {
          tag_name: 'v2.1.0-rc.1',
          name: null,
          published_at: null,
          prerelease: true,
          html_url: 'https://github.com/octo-org/widgets/releases/tag/v2.1.0-rc.1',
        },
      ]);

    const result = await task.run(
      task.parseParams({ repo: 'https://github.com/octo-org/widgets', max_releases: 2 }),
      context,
    );

    expect(result.repository).toEqual({
      name: 'widgets',
      fullName: 'octo-org/widgets',
      description: 'Widget toolkit',
      language: 'TypeScript',
      stars: 42,
      forks: 7,
      openIssues: 3,
      createdAt: '2024-01-02T00:00:00Z',
      updatedAt: '2026-10-01T00:00:00Z',
      cloneUrl: 'https://github.com/octo-org/widgets.git',
      homepage: null,
      topics: ['ui', 'widgets'],
      license: 'MIT License',
    });
    expect(result.releases).toEqual([
      {
        tagName: 'v2.0.0',
        name: 'Two',
        publishedAt: '2026-09-01T00:00:00Z',
        prerelease: false,
        url: 'https://github.com/octo-org/widgets/releases/tag/v2.0.0',
      },
      {
        tagName: 'v2.1.0-rc.1',
        name: null,
        publishedAt: null,
        prerelease: true,
        url: 'https://github.com/octo-org/widgets/releases/tag/v2.1.0-rc.1',
      },
    ]);
  });

  it('skips releases when asked to', async () => {
    agent
      .get(GITHUB_API_URL)
      .intercept({ path: '/repos/octo-org/widgets', method: 'GET' })
      .reply(200, { name: 'widgets', full_name: 'octo-org/widgets' });

    const result = await task.run(
      task.parseParams({ repo: 'octo-org/widgets', include_releases: false }),
      context,
    );

    expect(result).not.toHaveProperty('releases');
    expect(result.repository.stars).toBe(0);
    expect(result.repository.topics).toEqual([]);
  });

  it('does not send requests once the job signal is aborted', async () => {
    agent
      .get(GITHUB_API_URL)
      .intercept({ path: '/repos/octo-org/widgets', method: 'GET' })
      .reply(200, { name: 'widgets', full_name: 'octo-org/widgets' });
    const controller = new AbortController();
    controller.abort();

    await expect(
      task.run(task.parseParams({ repo: 'octo-org/widgets' }), {
        ...context,
        signal: controller.signal,
      }),
    ).rejects.toBeDefined();
    expect(agent.pendingInterceptors()).toHaveLength(1);
  });

  it('surfaces a missing repository as NotFound', async () => {
    agent
      .get(GITHUB_API_URL)
      .intercept({ path: '/repos/octo-org/missing', method: 'GET' })
      .reply(404, { message: 'Not Found' });

    const failure = task.run(
      task.parseParams({ repo: 'octo-org/missing' }),
      context,
    );

    await expect(failure).rejects.toBeInstanceOf(UpstreamRequestError);
    const error = await failure.catch((caught: unknown) => caught);
    expect(classifyError(error)).toEqual({
      kind: ScrapeErrorKind.NOT_FOUND,
      message: 'GitHub resource /repos/octo-org/missing not found',
    });
  });
});
