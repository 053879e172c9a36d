export const JOB_DEFAULTS = {
  concurrency: 2,
  maxQueueDepth: 0,
  timeoutSeconds: 300,
  retentionMinutes: 60,
} as const;

export const JOB_JANITOR_INTERVAL_MS = 60_000;

export const RESULT_FILE_NAME = 'result.json';
