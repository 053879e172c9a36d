import { ScrapeErrorKind } from '@/shared/common/errors/scrape.errors';
import { MetricsService, UNKNOWN_TASK_BUCKET } from './metrics.service';

describe('MetricsService', () => {
  let metrics: MetricsService;

  beforeEach(() => {
    metrics = new MetricsService();
  });

  it('counts job outcomes per task', () => {
    metrics.recordSubmitted('scrape-site');
    metrics.recordSubmitted('scrape-site');
    metrics.recordFinished('scrape-site', 1200);
    metrics.recordFailed('scrape-site', ScrapeErrorKind.TIMEOUT, 300000);
    metrics.recordRejected('booking-hotels');
    metrics.recordRejected(UNKNOWN_TASK_BUCKET);

    expect(metrics.taskMetrics()).toEqual({
      '<unknown>': {
        submitted: 0,
        rejected: 1,
        finished: 0,
        failed: 0,
        errorsByKind: {},
        totalRunMs: 0,
      },
      'booking-hotels': {
        submitted: 0,
        rejected: 1,
        finished: 0,
        failed: 0,
        errorsByKind: {},
        totalRunMs: 0,
      },
      'scrape-site': {
        submitted: 2,
        rejected: 0,
        finished: 1,
        failed: 1,
        errorsByKind: { Timeout: 1 },
        totalRunMs: 301200,
      },
    });
  });

  it('hands out copies', () => {
    metrics.recordFailed('github-repo', ScrapeErrorKind.NOT_FOUND, 10);
    const snapshot = metrics.taskMetrics();
    snapshot['github-repo'].errorsByKind[ScrapeErrorKind.NOT_FOUND] = 99;

    expect(metrics.taskMetrics()['github-repo'].errorsByKind).toEqual({
      NotFound: 1,
    });
  });

  it('counts requests by method, route and status', () => {
    metrics.recordRequest('POST', '/jobs/:taskName', 202);
    metrics.recordRequest('POST', '/jobs/:taskName', 202);
    metrics.recordRequest('POST', '/jobs/:taskName', 404);
    metrics.recordRequest('GET', '/healthz', 200);

    expect(metrics.requestCounts()).toEqual([
      { method: 'GET', route: '/healthz', statusCode: 200, count: 1 },
      { method: 'POST', route: '/jobs/:taskName', statusCode: 202, count: 2 },
      { method: 'POST', route: '/jobs/:taskName', statusCode: 404, count: 1 },
    ]);
  });
});
