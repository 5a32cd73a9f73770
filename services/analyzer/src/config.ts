import os from 'node:os';
import path from 'node:path';

import { z } from 'zod';

const logLevelSchema = z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']);

const configSchema = z.object({
  host: z.string().min(1),
  port: z.number().int().nonnegative(),
  logLevel: logLevelSchema,
  uploadDir: z.string().min(1),
  maxUploadBytes: z.number().int().positive(),
  sessionTtlSeconds: z.number().int().positive(),
  cookieSecret: z.string().min(16, 'must be at least 16 characters long'),
  rowOrder: z.enum(['first-seen', 'chronological'])
});

export type AnalyzerConfig = z.infer<typeof configSchema>;

export const DEFAULT_MAX_UPLOAD_BYTES = 16 * 1024 * 1024;
const DEFAULT_COOKIE_SECRET = 'dev-cookie-secret-change-me';

export class ConfigError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid station analyzer configuration\n${issues.map((issue) => `  - ${issue}`).join('\n')}`);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

type EnvSource = Record<string, string | undefined>;

const read = (env: EnvSource, key: string): string | undefined => {
  const value = env[`STATION_ANALYZER_${key}`]?.trim();
  return value ? value : undefined;
};

function parseInteger(value: string | undefined, fallback: number): number {
  if (value === undefined) {
    return fallback;
  }
  return /^-?\d+$/.test(value) ? Number.parseInt(value, 10) : Number.NaN;
}

export const loadConfig = (env: EnvSource = process.env): AnalyzerConfig => {
  const candidate = {
    host: read(env, 'HOST') ?? '0.0.0.0',
    port: parseInteger(read(env, 'PORT'), 4500),
    logLevel: read(env, 'LOG_LEVEL')?.toLowerCase() ?? 'info',
    uploadDir: path.resolve(read(env, 'UPLOAD_DIR') ?? path.join(os.tmpdir(), 'station-analyzer-uploads')),
    maxUploadBytes: parseInteger(read(env, 'MAX_UPLOAD_BYTES'), DEFAULT_MAX_UPLOAD_BYTES),
    sessionTtlSeconds: parseInteger(read(env, 'SESSION_TTL_SECONDS'), 30 * 60),
    cookieSecret: read(env, 'COOKIE_SECRET') ?? DEFAULT_COOKIE_SECRET,
    rowOrder: read(env, 'ROW_ORDER')?.toLowerCase() ?? 'first-seen'
  };

  const result = configSchema.safeParse(candidate);
  if (!result.success) {
    throw new ConfigError(
      result.error.issues.map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`)
    );
  }
  return result.data;
};
