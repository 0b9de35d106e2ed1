/**
 * Patrol client configuration
 *
 * Resolution order: command-line flags, then PATROL_* environment variables,
 * then config.json, then defaults.
 */

import fs from 'fs';
import os from 'os';
import path from 'path';
import { z } from 'zod';
import type { LogLevel } from './utils/logger.js';
import { toError } from '../../shared/errors.js';

export interface PatrolClientConfig {
  apiUrl: string;
  dataDir: string;
  syncIntervalMs: number;
  requestTimeoutMs: number;
  locationBatchSize: number;
  maxRetries: number;
  retryBaseDelayMs: number;
  retryMaxDelayMs: number;
  /** Reject checkpoint verifications farther than this from the checkpoint. Null disables the check. */
  proximityRadiusMeters: number | null;
  logLevel: LogLevel;
}

const logLevelSchema = z.enum(['DEBUG', 'INFO', 'WARN', 'ERROR', 'FATAL']);

const fileConfigSchema = z.object({
  apiUrl: z.string().url(),
  dataDir: z.string().min(1),
  syncIntervalMs: z.number().int().positive(),
  requestTimeoutMs: z.number().int().positive(),
  locationBatchSize: z.number().int().min(1).max(500),
  maxRetries: z.number().int().min(1),
  retryBaseDelayMs: z.number().int().nonnegative(),
  retryMaxDelayMs: z.number().int().nonnegative(),
  proximityRadiusMeters: z.number().positive().nullable(),
  logLevel: logLevelSchema,
}).partial();

export type PartialConfig = z.infer<typeof fileConfigSchema>;

export function getDefaultDataDir(): string {
  return path.join(os.homedir(), '.patrol-client');
}

export const DEFAULT_CONFIG: PatrolClientConfig = {
  apiUrl: '',
  dataDir: getDefaultDataDir(),
  syncIntervalMs: 60_000,
  requestTimeoutMs: 30_000,
  locationBatchSize: 50,
  maxRetries: 10,
  retryBaseDelayMs: 5_000,
  retryMaxDelayMs: 15 * 60_000,
  proximityRadiusMeters: null,
  logLevel: 'INFO',
};

export function parseArgs(argv: string[]): PartialConfig {
  const raw: Record<string, unknown> = {};

  for (let i = 0; i < argv.length; i++) {
    const value = argv[i + 1];
    switch (argv[i]) {
      case '--api':
        raw.apiUrl = value;
        i++;
        break;
      case '--data-dir':
        raw.dataDir = value;
        i++;
        break;
      case '--sync-interval':
        raw.syncIntervalMs = Number(value);
        i++;
        break;
      case '--proximity-radius':
        raw.proximityRadiusMeters = Number(value);
        i++;
        break;
      case '--log-level':
        raw.logLevel = value?.toUpperCase();
        i++;
        break;
    }
  }

  return parseLayer(raw, 'command line');
}

function numberFromEnv(value: string | undefined): number | undefined {
  if (value === undefined || value === '') return undefined;
  return Number(value);
}

export function loadEnvConfig(env: NodeJS.ProcessEnv): PartialConfig {
  const radius = env.PATROL_PROXIMITY_RADIUS_METERS;
  const raw: Record<string, unknown> = {
    apiUrl: env.PATROL_API_URL || undefined,
    dataDir: env.PATROL_DATA_DIR || undefined,
    syncIntervalMs: numberFromEnv(env.PATROL_SYNC_INTERVAL_MS),
    requestTimeoutMs: numberFromEnv(env.PATROL_REQUEST_TIMEOUT_MS),
    locationBatchSize: numberFromEnv(env.PATROL_LOCATION_BATCH_SIZE),
    maxRetries: numberFromEnv(env.PATROL_MAX_RETRIES),
    proximityRadiusMeters: radius === 'off' ? null : numberFromEnv(radius),
    logLevel: env.PATROL_LOG_LEVEL?.toUpperCase() || undefined,
  };

  return parseLayer(raw, 'environment');
}

export function loadConfigFile(configPath: string): PartialConfig {
  if (!fs.existsSync(configPath)) {
    return {};
  }
  const content = fs.readFileSync(configPath, 'utf-8');
  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (err) {
    throw new Error(`Failed to parse ${configPath}: ${toError(err).message}`);
  }
  return parseLayer(parsed, configPath);
}

function dropUndefined(raw: unknown): unknown {
  if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) return raw;
  return Object.fromEntries(Object.entries(raw).filter(([, value]) => value !== undefined));
}

function parseLayer(raw: unknown, source: string): PartialConfig {
  const result = fileConfigSchema.safeParse(dropUndefined(raw));
  if (!result.success) {
    const issues = result.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new Error(`Invalid configuration from ${source}: ${issues}`);
  }
  return result.data;
}

export interface LoadConfigOptions {
  configPath?: string;
  env?: NodeJS.ProcessEnv;
  argv?: string[];
}

export function loadConfig(options: LoadConfigOptions = {}): PatrolClientConfig {
  const env = options.env ?? process.env;
  const configPath = options.configPath || env.PATROL_CONFIG || path.join(getDefaultDataDir(), 'config.json');

  const config: PatrolClientConfig = {
    ...DEFAULT_CONFIG,
    ...loadConfigFile(configPath),
    ...loadEnvConfig(env),
    ...parseArgs(options.argv ?? []),
  };

  if (!config.apiUrl) {
    throw new Error('API URL is required. Set PATROL_API_URL, apiUrl in config.json, or --api.');
  }
  if (config.retryMaxDelayMs < config.retryBaseDelayMs) {
    throw new Error('retryMaxDelayMs must be greater than or equal to retryBaseDelayMs');
  }

  config.apiUrl = config.apiUrl.replace(/\/$/, '');
  return config;
}
