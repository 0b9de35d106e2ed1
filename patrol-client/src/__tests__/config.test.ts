import fs from 'fs';
import os from 'os';
import path from 'path';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { DEFAULT_CONFIG, loadConfig, loadEnvConfig, parseArgs } from '../config.js';

describe('loadConfig', () => {
  let dir: string;
  let configPath: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'patrol-config-'));
    configPath = path.join(dir, 'config.json');
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('layers flags over environment over file over defaults', () => {
    fs.writeFileSync(configPath, JSON.stringify({
      apiUrl: 'http://file.test',
      syncIntervalMs: 1000,
      maxRetries: 4,
    }));

    const config = loadConfig({
      configPath,
      env: { PATROL_API_URL: 'http://env.test/', PATROL_SYNC_INTERVAL_MS: '1500' },
      argv: ['--sync-interval', '2000'],
    });

    expect(config.apiUrl).toBe('http://env.test');
    expect(config.syncIntervalMs).toBe(2000);
    expect(config.maxRetries).toBe(4);
    expect(config.locationBatchSize).toBe(DEFAULT_CONFIG.locationBatchSize);
  });

  it('requires an API URL', () => {
    expect(() => loadConfig({ configPath, env: {} })).toThrow('API URL is required');
  });

  it('reports invalid file values with their source', () => {
    fs.writeFileSync(configPath, JSON.stringify({ apiUrl: 'http://file.test', locationBatchSize: 0 }));

    expect(() => loadConfig({ configPath, env: {} })).toThrow(`Invalid configuration from ${configPath}`);
  });

  it('rejects a file that is not JSON', () => {
    fs.writeFileSync(configPath, '{ apiUrl: ');

    expect(() => loadConfig({ configPath, env: {} })).toThrow(`Failed to parse ${configPath}`);
  });

  it('rejects a max delay below the base delay', () => {
    fs.writeFileSync(configPath, JSON.stringify({
      apiUrl: 'http://file.test',
      retryBaseDelayMs: 5000,
      retryMaxDelayMs: 1000,
    }));

    expect(() => loadConfig({ configPath, env: {} })).toThrow('retryMaxDelayMs must be greater than or equal to retryBaseDelayMs');
  });
});

describe('loadEnvConfig', () => {
  it('turns the proximity check off with "off"', () => {
    expect(loadEnvConfig({ PATROL_PROXIMITY_RADIUS_METERS: 'off' })).toEqual({ proximityRadiusMeters: null });
    expect(loadEnvConfig({ PATROL_PROXIMITY_RADIUS_METERS: '75' })).toEqual({ proximityRadiusMeters: 75 });
  });

  it('upper-cases the log level', () => {
    expect(loadEnvConfig({ PATROL_LOG_LEVEL: 'debug' })).toEqual({ logLevel: 'DEBUG' });
  });
});

describe('parseArgs', () => {
  it('reads known flags and ignores the rest', () => {
    expect(parseArgs(['--api', 'http://cli.test', '--verbose', '--data-dir', '/tmp/patrol'])).toEqual({
      apiUrl: 'http://cli.test',
      dataDir: '/tmp/patrol',
    });
  });

  it('ignores a flag given without a value', () => {
    expect(parseArgs(['--api'])).toEqual({});
  });
});
