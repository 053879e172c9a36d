import * as Joi from 'joi';

export const validationSchema = Joi.object({
  NODE_ENV: Joi.string()
    .valid('development', 'production', 'test')
    .default('development'),
  PORT: Joi.number().port().default(8000),

  // Job manager
  MAX_CONCURRENT_JOBS: Joi.number().integer().min(1).max(20).default(2),
  MAX_QUEUE_DEPTH: Joi.number().integer().min(0).default(0),
  JOB_TIMEOUT_SECONDS: Joi.number().integer().min(0).default(300),
  JOB_RETENTION_MINUTES: Joi.number().integer().min(0).default(60),
  OUTPUT_ROOT: Joi.string().allow('').default(''),

  // Browser
  BROWSER_HEADLESS: Joi.boolean().default(true),
  BROWSER_API_KEY: Joi.string().allow('').default(''),
  NAVIGATION_TIMEOUT_MS: Joi.number().integer().min(1000).max(120000).default(30000),
  NAVIGATION_ATTEMPTS: Joi.number().integer().min(1).max(10).default(3),

  // Review pagination
  REVIEW_MAX_PAGES: Joi.number().integer().min(1).max(500).default(50),
  REVIEW_STALL_LIMIT: Joi.number().integer().min(1).max(20).default(2),

  // API-backed tasks
  GITHUB_TOKEN: Joi.string().allow('').default(''),
  OPEN_DATA_REQUEST_DELAY_MS: Joi.number().integer().min(0).max(60000).default(800),
});
