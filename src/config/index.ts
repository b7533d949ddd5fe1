/**
 * @fileoverview Loads, validates, and exports application configuration.
 * Environment variables (optionally from a `.env` file) are parsed with Zod;
 * aliases are normalized and empty strings are treated as unset.
 * @module src/config/index
 */
import 'dotenv/config';
import { z } from 'zod';

import { AppError, ErrorCode } from '../types-global/errors.js';

export const LOG_LEVELS = [
  'debug',
  'info',
  'notice',
  'warning',
  'error',
  'crit',
  'alert',
  'emerg',
] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

const emptyStringAsUndefined = (value: unknown) =>
  typeof value === 'string' && value.trim() === '' ? undefined : value;

const logLevelAliases: Record<string, LogLevel> = {
  warn: 'warning',
  err: 'error',
  critical: 'crit',
  emergency: 'emerg',
};

const environmentAliases: Record<string, string> = {
  dev: 'development',
  prod: 'production',
};

const normalizeLogLevel = (value: unknown) => {
  if (typeof value !== 'string') return value;
  const lower = value.trim().toLowerCase();
  return logLevelAliases[lower] ?? lower;
};

const normalizeEnvironment = (value: unknown) => {
  if (typeof value !== 'string') return value;
  const lower = value.trim().toLowerCase();
  return environmentAliases[lower] ?? lower;
};

const positiveInt = (fallback: number) =>
  z.preprocess(
    emptyStringAsUndefined,
    z.coerce.number().int().positive().default(fallback),
  );

const ConfigSchema = z.object({
  environment: z.preprocess(
    (v) => normalizeEnvironment(emptyStringAsUndefined(v)),
    z.enum(['development', 'production', 'test']).default('development'),
  ),
  logLevel: z.preprocess(
    (v) => normalizeLogLevel(emptyStringAsUndefined(v)),
    z.enum(LOG_LEVELS).default('info'),
  ),
  http: z.object({
    host: z.preprocess(
      emptyStringAsUndefined,
      z.string().default('127.0.0.1'),
    ),
    port: z.preprocess(
      emptyStringAsUndefined,
      z.coerce.number().int().min(1).max(65535).default(5000),
    ),
  }),
  clinicalTrials: z.object({
    baseUrl: z.preprocess(
      emptyStringAsUndefined,
      z
        .string()
        .url()
        .default('https://clinicaltrials.gov/api/v2')
        .transform((url) => url.replace(/\/+$/, '')),
    ),
    timeoutMs: positiveInt(15000),
  }),
  search: z.object({
    maxResults: positiveInt(500),
    apiPageSize: z.preprocess(
      emptyStringAsUndefined,
      z.coerce.number().int().min(1).max(1000).default(100),
    ),
    resultsPageSize: positiveInt(25),
  }),
});

export type AppConfig = z.infer<typeof ConfigSchema>;

/**
 * Parses configuration from `process.env`.
 * @throws {AppError} ConfigurationError when any variable fails validation.
 */
export const parseConfig = (): AppConfig => {
  const env = process.env;
  const raw = {
    environment: env.NODE_ENV,
    logLevel: env.LOG_LEVEL,
    http: {
      host: env.HTTP_HOST,
      port: env.HTTP_PORT,
    },
    clinicalTrials: {
      baseUrl: env.CTGOV_API_BASE_URL,
      timeoutMs: env.CTGOV_TIMEOUT_MS,
    },
    search: {
      maxResults: env.MAX_RESULTS,
      apiPageSize: env.API_PAGE_SIZE,
      resultsPageSize: env.RESULTS_PAGE_SIZE,
    },
  };

  const parsed = ConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.flatten();
    // The logger depends on config, so it cannot report this yet.
    if (process.stdout.isTTY) {
      console.error(
        '❌ Invalid configuration found. Please check your environment variables.',
        issues,
      );
    }
    throw new AppError(
      ErrorCode.ConfigurationError,
      'Invalid application configuration.',
      { validationErrors: parsed.error.errors },
    );
  }

  return parsed.data;
};

export const config = parseConfig();
