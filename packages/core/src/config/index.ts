/**
 * Analytics configuration — where the static snapshots live and how loud to log.
 *
 * Read once from the environment (after dotenv loads `.env`) and memoized.
 */

import path from 'node:path';
import dotenv from 'dotenv';
import { z } from 'zod';
import { parseInput } from '@branchlens/shared';
import type { LogLevel } from '../observability/logger';

export interface AnalyticsConfig {
  dataDir: string;
  processedDir: string;
  externalDir: string;
  logLevel: LogLevel;
}

const envSchema = z.object({
  BRANCHLENS_DATA_DIR: z.string().min(1).optional(),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
});

let _config: AnalyticsConfig | null = null;

export function buildAnalyticsConfig(env: Record<string, string | undefined>): AnalyticsConfig {
  const parsed = parseInput(envSchema, env, 'Invalid analytics configuration');
  const dataDir = path.resolve(parsed.BRANCHLENS_DATA_DIR ?? path.join(process.cwd(), 'data'));
  return {
    dataDir,
    processedDir: path.join(dataDir, 'processed'),
    externalDir: path.join(dataDir, 'external'),
    logLevel: parsed.LOG_LEVEL,
  };
}

export function getAnalyticsConfig(): AnalyticsConfig {
  if (_config) return _config;
  dotenv.config();
  _config = buildAnalyticsConfig(process.env);
  return _config;
}

/** Reset cached config (for testing) */
export function resetAnalyticsConfig(): void {
  _config = null;
}
