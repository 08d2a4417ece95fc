import { config as dotenvConfig } from 'dotenv';
import { resolve } from 'path';
import { z } from 'zod';
import {
  DEFAULT_GITHUB_API_URL,
  DEFAULT_GITHUB_SERVER_URL,
  STATUS_POLL_INTERVAL_MS,
  STATUS_TIMEOUT_MS,
} from '@common/config.js';
import type { LogLevel } from '@modules/logger.js';

dotenvConfig();

export interface Config {
  github: {
    username: string;
    token: string;
    apiUrl: string;
    serverUrl: string;
  };
  author: {
    name: string;
    email: string;
  };
  status: {
    pollIntervalMs: number;
    timeoutMs: number;
  };
  paths: {
    workspaces: string;
    logs: string | null;
  };
  logLevel: LogLevel;
}

const positiveInt = (fallback: number) =>
  z.coerce.number().int().positive().default(fallback);

//NOTE: Empty strings in .env count as unset
const optionalString = z.preprocess(
  value => (typeof value === 'string' && value.trim() === '' ? undefined : value),
  z.string().optional()
);

const EnvSchema = z.object({
  GITHUB_USERNAME: z.string().min(1, 'is required'),
  GITHUB_TOKEN: z.string().min(1, 'is required'),
  GITHUB_API_URL: z.string().url().default(DEFAULT_GITHUB_API_URL),
  GITHUB_SERVER_URL: z.string().url().default(DEFAULT_GITHUB_SERVER_URL),
  GIT_AUTHOR_NAME: optionalString,
  GIT_AUTHOR_EMAIL: optionalString,
  WORKSPACE_DIR: optionalString,
  LOG_DIR: optionalString,
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  STATUS_POLL_INTERVAL_MS: positiveInt(STATUS_POLL_INTERVAL_MS),
  STATUS_TIMEOUT_MS: positiveInt(STATUS_TIMEOUT_MS),
});

export class ConfigError extends Error {
  constructor(message: string, public readonly variables: string[]) {
    super(message);
    this.name = 'ConfigError';
  }
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env, cwd: string = process.cwd()): Config {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const variables = [...new Set(parsed.error.issues.map(issue => String(issue.path[0])))];
    const details = parsed.error.issues
      .map(issue => `${String(issue.path[0])} ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid environment: ${details}`, variables);
  }

  const e = parsed.data;
  return {
    github: {
      username: e.GITHUB_USERNAME,
      token: e.GITHUB_TOKEN,
      apiUrl: e.GITHUB_API_URL.replace(/\/+$/, ''),
      serverUrl: e.GITHUB_SERVER_URL.replace(/\/+$/, ''),
    },
    author: {
      name: e.GIT_AUTHOR_NAME ?? e.GITHUB_USERNAME,
      email: e.GIT_AUTHOR_EMAIL ?? `${e.GITHUB_USERNAME}@users.noreply.github.com`,
    },
    status: {
      pollIntervalMs: e.STATUS_POLL_INTERVAL_MS,
      timeoutMs: e.STATUS_TIMEOUT_MS,
    },
    paths: {
      workspaces: resolve(cwd, e.WORKSPACE_DIR ?? '.'),
      logs: e.LOG_DIR ? resolve(cwd, e.LOG_DIR) : null,
    },
    logLevel: e.LOG_LEVEL,
  };
}

let cachedConfig: Config | null = null;

export function getConfig(): Config {
  if (!cachedConfig) {
    cachedConfig = loadConfig();
  }
  return cachedConfig;
}
