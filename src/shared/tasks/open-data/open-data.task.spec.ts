import { Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Test } from '@nestjs/testing';
import { mkdtemp, readFile, readdir, rm } from 'fs/promises';
import { tmpdir } from 'os';
import * as path from 'path';
import {
  Dispatcher,
  MockAgent,
  getGlobalDispatcher,
  setGlobalDispatcher,
} from 'undici';
import type { BrowserSession } from '@/shared/browser/interfaces/browser-session.interface';
import { InvalidParamsError } from '@/shared/common/errors/scrape.errors';
import { TaskContext } from '../interfaces/task.interface';
import { OpenDataApiClient } from './open-data-api.client';
import { OPEN_DATA_BASE_URL } from './open-data-files';
import { OpenDataTask } from './open-data.task';

const json = (body: unknown) => JSON.stringify(body);

describe('OpenDataTask', () => {
  let agent: MockAgent;
  let previousDispatcher: Dispatcher;
  let outputRoot: string;
  let task: OpenDataTask;
  let newPage: jest.Mock;
  let abort: AbortController;
  let context: TaskContext;

  const portal = () => agent.get(OPEN_DATA_BASE_URL);
  const metadataPath = (id: string) => `/data/api/datasets?version=-1&dataset=${id}`;
  const resourcesPath = (id: string) =>
    `/data/api/datasets/resources?version=-1&dataset=${id}`;
  const v1Path = (id: string, resourceId: string) =>
    `/data/api/v1/datasets/${id}/resources/${resourceId}/download`;

  beforeEach(async () => {
    previousDispatcher = getGlobalDispatcher();
    agent = new MockAgent();
    agent.disableNetConnect();
    setGlobalDispatcher(agent);

    outputRoot = await mkdtemp(path.join(tmpdir(), 'open-data-task-'));
    const moduleRef = await Test.createTestingModule({
      providers: [
        OpenDataTask,
        OpenDataApiClient,
        {
          provide: ConfigService,
          useValue: new ConfigService({
            OUTPUT_ROOT: outputRoot,
            OPEN_DATA_REQUEST_DELAY_MS: 0,
            NAVIGATION_ATTEMPTS: 1,
          }),
        },
      ],
    }).compile();
    task = moduleRef.get(OpenDataTask);

    newPage = jest.fn();
    const session: BrowserSession = {
      id: 'session-1',
      jobId: 'job-1',
      newPage,
      close: jest.fn(async () => undefined),
    };
    abort = new AbortController();
    context = {
      jobId: 'job-1',
      session,
      logger: new Logger('test'),
      signal: abort.signal,
    };
  });

  afterEach(async () => {
    setGlobalDispatcher(previousDispatcher);
    await agent.close();
    await rm(outputRoot, { recursive: true, force: true });
  });

  describe('parseParams', () => {
    it('accepts a dataset id', () => {
      expect(task.parseParams({ dataset_id: 'ds-1' })).toEqual({
        mode: 'dataset',
        datasetId: 'ds-1',
      });
    });

    it('accepts a publisher with a range', () => {
      expect(
        task.parseParams({
          publisher_id: 'pub-1',
          dataset_range: [2, 5],
          max_resources: 3,
        }),
      ).toEqual({
        mode: 'publisher',
        publisherId: 'pub-1',
        range: [2, 5],
        maxResources: 3,
      });
    });

    it.each([
      [{}],
      [{ dataset_id: 'ds-1', publisher_id: 'pub-1' }],
      [{ publisher_id: 'pub-1', dataset_range: [5, 2] }],
      [{ publisher_id: 'pub-1', dataset_range: [1] }],
      [{ dataset_id: '../etc' }],
    ])('rejects %j', (params) => {
      expect(() => task.parseParams(params)).toThrow(InvalidParamsError);
    });
  });

  it('downloads every resource of a dataset', async () => {
    portal()
      .intercept({ path: metadataPath('ds-1'), method: 'GET' })
      .reply(200, json({ titleEn: 'Hospital Beds' }));
    portal().intercept({ path: resourcesPath('ds-1'), method: 'GET' }).reply(
      200,
      json({
        resources: [
          {
            resourceID: 'r1',
            name: 'Beds 2023',
            format: 'CSV',
            downloadUrl: 'uploads/beds 2023.csv',
          },
          {
            resourceID: 'r2',
            titleEn: 'Beds Summary',
            format: 'XLSX',
            downloadUrl: 'https://open.data.gov.sa/data/uploads/summary.xlsx',
          },
        ],
      }),
    );
    portal()
      .intercept({ path: v1Path('ds-1', 'r1'), method: 'GET' })
      .reply(200, 'region,beds\nRiyadh,120\n', {
        headers: {
          'content-type': 'text/csv',
          'content-disposition': 'attachment; filename="beds-2023.csv"',
        },
      });
    portal().intercept({ path: v1Path('ds-1', 'r2'), method: 'GET' }).reply(500, '');
    portal()
      .intercept({ path: '/data/uploads/summary.xlsx', method: 'GET' })
      .reply(200, Buffer.from([0x50, 0x4b, 0x03, 0x04, 0x01, 0x02, 0x03]));

    const result = await task.run({ mode: 'dataset', datasetId: 'ds-1' }, context);

    const datasetDir = path.join(outputRoot, 'saudi-open-data', 'job-1', 'ds-1');
    expect(result).toEqual({
      datasetId: 'ds-1',
      title: 'Hospital Beds',
      url: 'https://open.data.gov.sa/en/datasets/view/ds-1/resources',
      status: 'success',
      totalResources: 2,
      downloaded: 2,
      failed: 0,
      outputDir: datasetDir,
      files: [
        {
          resourceId: 'r1',
          resourceName: 'Beds 2023',
          stage: 'api-v1',
          file: 'beds-2023.csv',
          size: 23,
          sha256: expect.stringMatching(/^[0-9a-f]{64}$/),
          kind: 'csv_text',
        },
        {
          resourceId: 'r2',
          resourceName: 'Beds Summary',
          stage: 'direct',
          file: 'summary.xlsx',
          size: 7,
          sha256: expect.stringMatching(/^[0-9a-f]{64}$/),
          kind: 'xlsx_zip',
        },
      ],
    });
    expect(
      await readFile(path.join(datasetDir, 'downloads', 'beds-2023.csv'), 'utf8'),
    ).toBe('region,beds\nRiyadh,120\n');

    const resources = JSON.parse(
      await readFile(path.join(datasetDir, 'resources.json'), 'utf8'),
    );
    expect(resources[0].downloadUrl).toBe(
      'https://open.data.gov.sa/data/uploads/beds%202023.csv',
    );
    expect(newPage).not.toHaveBeenCalled();
  });

  it('warms portal cookies in the browser after a bot-check page', async () => {
    const page = {
      goto: jest.fn(async (_url: string, _options?: object) => null),
      waitForTimeout: jest.fn(async () => undefined),
      close: jest.fn(async () => undefined),
      context: () => ({
        cookies: jest.fn(async () => [
          { name: 'TS01ab', value: 'token-1' },
          { name: 'visit', value: '1' },
        ]),
      }),
    };
    newPage.mockResolvedValue(page);

    portal().intercept({ path: metadataPath('ds-2'), method: 'GET' }).reply(404, '');
    portal().intercept({ path: resourcesPath('ds-2'), method: 'GET' }).reply(
      200,
      json({ resources: [{ resourceID: 'r7', name: 'Clinics', format: 'JSON' }] }),
    );
    portal()
      .intercept({ path: v1Path('ds-2', 'r7'), method: 'GET' })
      .reply(200, '<!DOCTYPE html><html><body>checking</body></html>', {
        headers: { 'content-type': 'text/html' },
      });
    portal()
      .intercept({
        path: v1Path('ds-2', 'r7'),
        method: 'GET',
        headers: { cookie: 'TS01ab=token-1; visit=1' },
      })
      .reply(200, '[{"clinic":"North","beds":12}]');

    const result = await task.run({ mode: 'dataset', datasetId: 'ds-2' }, context);

    expect(page.goto.mock.calls.map(([url]) => url)).toEqual([
      'https://open.data.gov.sa/',
      'https://open.data.gov.sa/en/datasets/view/ds-2/resources',
    ]);
    expect(page.close).toHaveBeenCalledTimes(1);
    expect(result).toMatchObject({
      title: null,
      status: 'success',
      downloaded: 1,
      files: [
        {
          resourceId: 'r7',
          stage: 'api-v1-warmed',
          file: 'Clinics.json',
          size: 30,
          kind: 'json_text',
        },
      ],
    });
    expect(
      await readdir(path.join(outputRoot, 'saudi-open-data', 'job-1', 'ds-2', 'downloads')),
    ).toEqual(['Clinics.json']);
  });

  it('records every attempt of a resource that cannot be fetched', async () => {
    portal()
      .intercept({ path: metadataPath('ds-3'), method: 'GET' })
      .reply(200, json({ titleEn: 'Archive' }));
    portal().intercept({ path: resourcesPath('ds-3'), method: 'GET' }).reply(
      200,
      json({
        resources: [
          { resourceID: 'r8', name: 'Old', format: 'CSV', downloadUrl: '/uploads/old.csv' },
        ],
      }),
    );
    portal().intercept({ path: v1Path('ds-3', 'r8'), method: 'GET' }).reply(404, '');
    portal().intercept({ path: '/data/uploads/old.csv', method: 'GET' }).reply(404, '');

    const result = await task.run({ mode: 'dataset', datasetId: 'ds-3' }, context);

    expect(result).toMatchObject({
      title: 'Archive',
      status: 'failed',
      totalResources: 1,
      downloaded: 0,
      failed: 1,
      files: [],
    });
    const downloads = JSON.parse(
      await readFile(
        path.join(outputRoot, 'saudi-open-data', 'job-1', 'ds-3', 'downloads.json'),
        'utf8',
      ),
    );
    expect(downloads).toEqual([
      {
        status: 'error',
        resourceId: 'r8',
        resourceName: 'Old',
        reason: 'http_404',
        attempts: [
          { stage: 'api-v1', reason: 'http_404' },
          { stage: 'direct', reason: 'http_404' },
        ],
      },
    ]);
    expect(newPage).not.toHaveBeenCalled();
  });

  it('walks a slice of a publisher catalogue and keeps going past failures', async () => {
    portal()
      .intercept({
        path: '/data/api/organizations?version=-1&organization=pub-1',
        method: 'GET',
      })
      .reply(
        200,
        json({
          datasets: [
            { id: 'ds-a', titleEn: 'Alpha' },
            { id: 'ds-b', titleAr: 'بيانات' },
            { id: 'ds-c', titleEn: 'Gamma' },
          ],
        }),
      );
    portal()
      .intercept({ path: metadataPath('ds-a'), method: 'GET' })
      .reply(200, json({ titleEn: 'Alpha' }));
    portal().intercept({ path: resourcesPath('ds-a'), method: 'GET' }).reply(
      200,
      json({ resources: [{ resourceID: 'ra', name: 'Alpha data', format: 'CSV' }] }),
    );
    portal()
      .intercept({ path: v1Path('ds-a', 'ra'), method: 'GET' })
      .reply(200, 'x,y\n1,2\n', { headers: { 'content-type': 'text/csv' } });
    portal().intercept({ path: metadataPath('ds-b'), method: 'GET' }).reply(404, '');
    portal().intercept({ path: resourcesPath('ds-b'), method: 'GET' }).reply(404, '');

    const result = await task.run(
      { mode: 'publisher', publisherId: 'pub-1', range: [0, 1] },
      context,
    );
    if (!('publisherId' in result)) {
      throw new Error('expected a publisher result');
    }

    expect(result).toMatchObject({
      publisherId: 'pub-1',
      totalDatasets: 2,
      datasetsSucceeded: 1,
      datasetsPartial: 0,
      datasetsFailed: 1,
      totalFilesOk: 1,
      totalFilesFailed: 0,
      outputDir: path.join(outputRoot, 'saudi-open-data', 'job-1', 'pub-1'),
    });
    expect(result.datasets[0]).toMatchObject({ datasetId: 'ds-a', status: 'success' });
    expect(result.datasets[0]).not.toHaveProperty('files');
    expect(result.datasets[1]).toMatchObject({
      datasetId: 'ds-b',
      title: 'بيانات',
      status: 'failed',
      error:
        'Open data API responded 404 for /data/api/datasets/resources?version=-1&dataset=ds-b',
    });
    expect(agent.pendingInterceptors()).toHaveLength(0);
  });

  it('treats an unknown publisher as an empty catalogue', async () => {
    portal()
      .intercept({
        path: '/data/api/organizations?version=-1&organization=nobody',
        method: 'GET',
      })
      .reply(404, '');

    const result = await task.run(
      { mode: 'publisher', publisherId: 'nobody' },
      context,
    );

    expect(result).toMatchObject({ totalDatasets: 0, datasetsFailed: 0 });
  });

  it('sends no requests once the job signal is aborted', async () => {
    portal()
      .intercept({ path: metadataPath('ds-4'), method: 'GET' })
      .reply(200, json({ titleEn: 'Late' }));
    abort.abort();

    await expect(
      task.run({ mode: 'dataset', datasetId: 'ds-4' }, context),
    ).rejects.toThrow();
    expect(agent.pendingInterceptors()).toHaveLength(1);
  });
});
