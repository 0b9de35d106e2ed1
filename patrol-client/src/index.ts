#!/usr/bin/env node

/**
 * Patrol client CLI
 *
 * Usage:
 *   patrol-client <command> [args] [--api <url>] [--data-dir <dir>] [--log-level <level>]
 *
 * Commands:
 *   login <phone>                       Request a one-time code
 *   verify <phone> <verificationId> <code>
 *                                       Sign in with the code
 *   run                                 Sync in the background until stopped
 *   sync                                Run one sync cycle and exit
 *   status                              Show clock and queue status
 *   clock-in <lat> <lon> / clock-out <lat> <lon>
 *   retry-failed [entityType]           Re-arm uploads the backend rejected
 */

import path from 'path';
import { loadConfig, type PatrolClientConfig } from './config.js';
import { PatrolClient } from './client.js';
import { isEntityType } from './models.js';
import { getLogger, initializeLogger } from './utils/logger.js';
import { UnauthorizedError, ValidationError, isAppError, toError } from '../../shared/errors.js';

const logger = getLogger('CLI');

function splitArgs(argv: string[]): { positionals: string[]; flags: string[] } {
  const index = argv.findIndex(arg => arg.startsWith('--'));
  return index === -1
    ? { positionals: argv, flags: [] }
    : { positionals: argv.slice(0, index), flags: argv.slice(index) };
}

function requireUser(client: PatrolClient): string {
  const userId = client.auth.getUserId();
  if (!userId || !client.auth.isTokenValid()) {
    throw new UnauthorizedError('Not signed in. Run "login" and "verify" first.');
  }
  return userId;
}

function parseCoordinate(value: string | undefined, name: string): number {
  const parsed = Number(value);
  if (value === undefined || Number.isNaN(parsed)) {
    throw new ValidationError(`${name} is required`, name);
  }
  return parsed;
}

function print(value: unknown): void {
  console.log(JSON.stringify(value, null, 2));
}

async function runCommand(client: PatrolClient, command: string, args: string[]): Promise<void> {
  switch (command) {
    case 'login': {
      const verificationId = await client.auth.requestCode(args[0] ?? '');
      print({ verificationId });
      return;
    }
    case 'verify': {
      const user = await client.auth.validateCode(args[0] ?? '', args[1] ?? '', args[2] ?? '');
      await client.referenceSync.syncReferenceData();
      print({ userId: user.id, expiresAt: client.auth.getExpiresAt() });
      return;
    }
    case 'sync': {
      requireUser(client);
      await client.referenceSync.syncReferenceData();
      const result = await client.syncEngine.syncAll();
      print(result.toJSON());
      return;
    }
    case 'status': {
      const userId = requireUser(client);
      print({
        clock: client.timeTracking.getStatus(userId),
        queue: client.syncEngine.getSyncStatistics(),
      });
      return;
    }
    case 'clock-in':
    case 'clock-out': {
      const userId = requireUser(client);
      const lat = parseCoordinate(args[0], 'latitude');
      const lon = parseCoordinate(args[1], 'longitude');
      const record = command === 'clock-in'
        ? client.timeTracking.clockIn(userId, lat, lon)
        : client.timeTracking.clockOut(userId, lat, lon);
      print(record);
      return;
    }
    case 'retry-failed': {
      const entityType = args[0];
      if (entityType !== undefined && !isEntityType(entityType)) {
        throw new ValidationError(`Unknown entity type: ${entityType}`, 'entityType');
      }
      print({ rearmed: client.syncEngine.retryFailed(entityType) });
      return;
    }
    default:
      throw new ValidationError(`Unknown command: ${command}`);
  }
}

async function runDaemon(client: PatrolClient, config: PatrolClientConfig): Promise<void> {
  console.log('='.repeat(60));
  console.log('Patrol Client');
  console.log('='.repeat(60));
  console.log(`API URL: ${config.apiUrl}`);
  console.log(`Data Directory: ${config.dataDir}`);
  console.log(`Sync Interval: ${config.syncIntervalMs / 1000}s`);
  console.log('');

  await client.start();

  const shutdown = () => {
    console.log('\nShutting down patrol client...');
    client.stop()
      .then(() => {
        console.log('Patrol client stopped');
        process.exit(0);
      })
      .catch(err => {
        logger.error('Shutdown failed', toError(err));
        process.exit(1);
      });
  };
  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
}

async function main(): Promise<void> {
  const { positionals, flags } = splitArgs(process.argv.slice(2));
  const [command = 'run', ...args] = positionals;

  const config = loadConfig({ argv: flags });
  initializeLogger({ logDir: path.join(config.dataDir, 'logs'), minLevel: config.logLevel });

  const client = new PatrolClient(config);

  if (command === 'run') {
    await runDaemon(client, config);
    return;
  }

  client.auth.restore();
  try {
    await runCommand(client, command, args);
  } finally {
    await client.stop();
  }
}

main().catch((e) => {
  const error = toError(e);
  if (isAppError(error)) {
    console.error(`Error: ${error.message}`);
  } else {
    console.error('Patrol client failed:', error);
  }
  process.exit(1);
});
