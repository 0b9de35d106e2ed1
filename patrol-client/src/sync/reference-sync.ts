/**
 * Reference data sync
 *
 * Pulls patrol locations and their checkpoints from the backend into the
 * local cache. Reference rows are keyed by RemoteId, so repeated pulls
 * refresh in place instead of duplicating.
 */

import type { Database } from '../db/database.js';
import type { CheckpointRepository } from '../repositories/checkpoint-repository.js';
import type { PatrolLocationRepository } from '../repositories/patrol-location-repository.js';
import type { CallOptions, RemoteApi } from './remote-api.js';
import { withRetry, type RetryConfig } from '../utils/retry.js';
import { getLogger } from '../utils/logger.js';
import { AppError, TransientNetworkError } from '../../../shared/errors.js';

const logger = getLogger('ReferenceSync');

export interface ReferenceSyncResult {
  locations: number;
  checkpoints: number;
  syncedAt: string;
}

export class ReferenceSync {
  private syncInProgress: Promise<ReferenceSyncResult> | null = null;
  private lastSyncAt: string | null = null;

  constructor(
    private readonly db: Database,
    private readonly api: RemoteApi,
    private readonly locations: PatrolLocationRepository,
    private readonly checkpoints: CheckpointRepository,
    private readonly retry: Partial<RetryConfig> = {}
  ) {}

  getLastSyncAt(): string | null {
    return this.lastSyncAt;
  }

  /** Concurrent callers share the running pull. */
  syncReferenceData(options: CallOptions = {}): Promise<ReferenceSyncResult> {
    if (!this.syncInProgress) {
      this.syncInProgress = this.pull(options).finally(() => {
        this.syncInProgress = null;
      });
    }
    return this.syncInProgress;
  }

  private async pull(options: CallOptions): Promise<ReferenceSyncResult> {
    const retryConfig: Partial<RetryConfig> = {
      maxAttempts: 3,
      baseDelayMs: 1000,
      // Only network trouble is worth another attempt; rejections are final.
      shouldRetry: error => error instanceof TransientNetworkError || !(error instanceof AppError),
      signal: options.signal,
      ...this.retry,
    };

    const remoteLocations = await withRetry(() => this.api.getPatrolLocations(options), retryConfig);

    let checkpointCount = 0;
    for (const remoteLocation of remoteLocations) {
      const remoteCheckpoints = await withRetry(
        () => this.api.getCheckpoints(remoteLocation.remoteId, options),
        retryConfig
      );

      checkpointCount += this.db.transaction(() => {
        const locationId = this.locations.upsertFromRemote(remoteLocation);
        for (const checkpoint of remoteCheckpoints) {
          this.checkpoints.upsertFromRemote(locationId, checkpoint);
        }
        return remoteCheckpoints.length;
      });
    }

    this.lastSyncAt = new Date().toISOString();
    logger.info('Reference data synced', { locations: remoteLocations.length, checkpoints: checkpointCount });
    return { locations: remoteLocations.length, checkpoints: checkpointCount, syncedAt: this.lastSyncAt };
  }
}
