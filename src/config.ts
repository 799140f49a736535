import * as dotenv from 'dotenv';
import { z } from 'zod';

// Load environment variables from .env file
dotenv.config();

export interface Config {
  debug: boolean;
  api: {
    url: string;
    projectId: string;
    accessToken?: string;
  };
  jobs: {
    pollIntervalMs: number;
    waitTimeoutMs?: number;
  };
}

// Zod validation schema
const ConfigSchema = z.object({
  debug: z.boolean(),
  api: z.object({
    url: z.string().url('Invalid query API URL format'),
    projectId: z.string().min(1, 'Project ID must not be empty'),
    accessToken: z.string().min(1).optional(),
  }),
  jobs: z.object({
    pollIntervalMs: z.number().int().min(1).max(3600000),
    waitTimeoutMs: z.number().int().min(0).optional(),
  }),
});

type Env = Record<string, string | undefined>;

/**
 * Get configuration from environment variables.
 * Validates configuration against schema and throws error if invalid
 */
export function getConfig(env: Env = process.env): Config {
  const getString = (envKey: string, defaultValue: string): string => {
    return env[envKey] || defaultValue;
  };

  const getOptionalString = (envKey: string): string | undefined => {
    return env[envKey] || undefined;
  };

  const getBoolean = (envKey: string, defaultValue: boolean): boolean => {
    const envValue = env[envKey];
    return envValue === 'true' ? true : (envValue === 'false' ? false : defaultValue);
  };

  const getNumber = (envKey: string, defaultValue?: number): number | undefined => {
    const envValue = env[envKey];
    return envValue ? Number(envValue) : defaultValue;
  };

  const rawConfig = {
    debug: getBoolean('DEBUG', false),
    api: {
      url: getString('QUERY_API_URL', 'http://localhost:8080/v2'),
      projectId: getString('QUERY_PROJECT_ID', ''),
      accessToken: getOptionalString('QUERY_ACCESS_TOKEN'),
    },
    jobs: {
      pollIntervalMs: getNumber('JOB_POLL_INTERVAL_MS', 5000),
      waitTimeoutMs: getNumber('JOB_WAIT_TIMEOUT_MS'),
    },
  };

  const result = ConfigSchema.safeParse(rawConfig);
  if (!result.success) {
    const lines = result.error.errors.map((err) => {
      const path = err.path.join('.');
      return `  ${path || 'root'}: ${err.message}`;
    });
    throw new Error(`Invalid configuration:\n${lines.join('\n')}`);
  }
  return result.data;
}
