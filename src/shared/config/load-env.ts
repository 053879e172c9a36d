import fs from 'fs';
import path from 'path';
import dotenv from 'dotenv';
import { Logger } from '@nestjs/common';

const logger = new Logger('LoadEnv');

const ENV_FILE_BY_NODE_ENV: Record<string, string> = {
  production: '.env.prod',
  development: '.env.local',
};

/**
 * Loads the dotenv file matching NODE_ENV into `env` before ConfigModule
 * validates it. ENV_FILE wins when set; `.env` is the fallback.
 * Returns the file that was loaded, if any.
 */
export function loadEnv(
  env: NodeJS.ProcessEnv = process.env,
  cwd: string = process.cwd(),
): string | null {
  const nodeEnv = env.NODE_ENV || 'development';
  const envFile = env.ENV_FILE || ENV_FILE_BY_NODE_ENV[nodeEnv] || '.env';

  for (const candidate of envFile === '.env' ? ['.env'] : [envFile, '.env']) {
    const envPath = path.resolve(cwd, candidate);
    if (!fs.existsSync(envPath)) continue;

    const parsed = dotenv.parse(fs.readFileSync(envPath));
    for (const [key, value] of Object.entries(parsed)) {
      if (env[key] === undefined) env[key] = value;
    }
    logger.log(
      `Loaded environment from ${candidate}${candidate === envFile ? '' : ' (fallback)'}`,
    );
    return envPath;
  }

  logger.warn(
    `Environment file ${envFile} not found and no .env fallback available.`,
  );
  return null;
}
