// src/config/index.ts
import dotenv from 'dotenv';
import { ValidationError } from '../errors';

// Values already present in the environment take precedence over .env
dotenv.config();

export const DEFAULT_BASE_URL = 'https://app.docsearch.dev';
export const DEFAULT_TIMEOUT_MS = 30_000;
export const DEFAULT_POLL_INTERVAL_MS = 2_000;
export const DEFAULT_POLL_TIMEOUT_MS = 300_000;
export const UPLOAD_TIMEOUT_MULTIPLIER = 10;

export type RouteProfileName = 'organization' | 'sdk';
export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

type Env = Record<string, string | undefined>;

// Helper function to get environment variables with defaults
export const getEnvVar = (key: string, defaultValue: string, env: Env = process.env): string => {
  const value = env[key];
  if (value === undefined || value.trim() === '') {
    return defaultValue;
  }
  return value.trim();
};

const parsePositiveInt = (key: string, raw: string): number => {
  const parsed = Number.parseInt(raw, 10);
  if (!Number.isFinite(parsed) || parsed <= 0) {
    throw new ValidationError(`Environment variable ${key} must be a positive integer, got '${raw}'`);
  }
  return parsed;
};

// Readers are called only for settings the caller did not pass explicitly.

/** Empty when neither the environment nor .env provides one. */
export const readApiKey = (env: Env = process.env): string => getEnvVar('DOCSEARCH_API_KEY', '', env);

export const readBaseUrl = (env: Env = process.env): string =>
  getEnvVar('DOCSEARCH_BASE_URL', DEFAULT_BASE_URL, env);

export const readTimeoutMs = (env: Env = process.env): number =>
  parsePositiveInt('DOCSEARCH_TIMEOUT_MS', getEnvVar('DOCSEARCH_TIMEOUT_MS', String(DEFAULT_TIMEOUT_MS), env));

export const readRouteProfile = (env: Env = process.env): RouteProfileName => {
  const raw = getEnvVar('DOCSEARCH_ROUTES', 'organization', env);
  if (raw === 'organization' || raw === 'sdk') return raw;
  throw new ValidationError(`Environment variable DOCSEARCH_ROUTES must be 'organization' or 'sdk', got '${raw}'`);
};

export const readLogLevel = (env: Env = process.env): LogLevel => {
  const raw = getEnvVar('DOCSEARCH_LOG_LEVEL', 'warn', env);
  const level = raw.toLowerCase();
  if (level === 'error' || level === 'warn' || level === 'info' || level === 'debug') return level;
  throw new ValidationError(`Environment variable DOCSEARCH_LOG_LEVEL must be one of error, warn, info, debug, got '${raw}'`);
};
