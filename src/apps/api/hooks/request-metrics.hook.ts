import type { FastifyInstance } from 'fastify';
import type { MetricsService } from '@/shared/metrics/services/metrics.service';

export const UNMATCHED_ROUTE = '<unmatched>';

/**
 * Counts every reply by method, route pattern and status. Runs on the raw
 * Fastify instance so guard rejections and filtered errors are counted too.
 */
export function registerRequestMetrics(
  instance: FastifyInstance,
  metrics: MetricsService,
): void {
  instance.addHook('onResponse', async (request, reply) => {
    metrics.recordRequest(
      request.method,
      request.routeOptions.url ?? UNMATCHED_ROUTE,
      reply.statusCode,
    );
  });
}
