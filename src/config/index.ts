/**
 * @fileoverview Loads and validates application configuration from the environment.
 * Values come from `process.env` (optionally populated from a `.env` file) and are
 * validated with zod; invalid configuration stops the process at startup.
 * @module src/config/index
 */
import dotenv from 'dotenv';
import { z } from 'zod';

dotenv.config();

export const LOG_LEVELS = [
  'debug',
  'info',
  'notice',
  'warning',
  'error',
  'crit',
  'silent',
] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

const EnvSchema = z.object({
  MCP_SERVER_NAME: z.string().min(1).default('antibody-complex-mcp-server'),
  MCP_SERVER_VERSION: z.string().min(1).default('1.0.0'),
  LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
  STRUCTURE_OUTPUT_DIR: z.string().min(1).default('downloads'),
  ARCHIVE_FILES_URL: z.string().url().default('https://files.rcsb.org/download'),
  FETCH_TIMEOUT_MS: z.coerce.number().int().positive().default(60000),
  FETCH_MAX_ATTEMPTS: z.coerce.number().int().min(1).max(10).default(3),
  FETCH_RETRY_DELAY_MS: z.coerce.number().int().min(0).default(2000),
  BATCH_PARALLELISM: z.coerce.number().int().min(1).max(64).default(1),
  PRIMARY_FORMAT: z.enum(['pdb', 'mmcif']).default('pdb'),
});

/**
 * Validated application configuration.
 */
export interface AppConfig {
  mcpServerName: string;
  mcpServerVersion: string;
  logLevel: LogLevel;
  outputDir: string;
  archiveFilesUrl: string;
  fetchTimeoutMs: number;
  fetchMaxAttempts: number;
  fetchRetryDelayMs: number;
  batchParallelism: number;
  primaryFormat: 'pdb' | 'mmcif';
}

/**
 * Parses an environment record into an {@link AppConfig}.
 * @throws {Error} listing every invalid variable.
 */
export function parseConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid environment configuration: ${issues}`);
  }

  const env_ = parsed.data;
  return {
    mcpServerName: env_.MCP_SERVER_NAME,
    mcpServerVersion: env_.MCP_SERVER_VERSION,
    logLevel: env_.LOG_LEVEL,
    outputDir: env_.STRUCTURE_OUTPUT_DIR,
    archiveFilesUrl: env_.ARCHIVE_FILES_URL.replace(/\/+$/, ''),
    fetchTimeoutMs: env_.FETCH_TIMEOUT_MS,
    fetchMaxAttempts: env_.FETCH_MAX_ATTEMPTS,
    fetchRetryDelayMs: env_.FETCH_RETRY_DELAY_MS,
    batchParallelism: env_.BATCH_PARALLELISM,
    primaryFormat: env_.PRIMARY_FORMAT,
  };
}

export const config: AppConfig = parseConfig();
