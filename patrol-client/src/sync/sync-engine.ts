/**
 * Sync engine
 *
 * Drains the sync queue against the backend, one entity type at a time in
 * priority order:
 * - success marks the entity synced, stores its RemoteId and drops the row
 * - transient failures consume a retry and back off
 * - backend rejections park the row at the retry cap
 * - an auth failure stops the drain and asks for re-authentication
 *
 * Each entity type has at most one drain in flight; overlapping triggers
 * join it instead of starting another.
 */

import { readFile } from 'fs/promises';
import type { Database } from '../db/database.js';
import {
  ENTITY_TYPES,
  SYNC_PRIORITY,
  type EntityType,
  type Photo,
  type Syncable,
  type SyncQueueItem,
} from '../models.js';
import type { EntityKey, SyncableRepository } from '../repositories/base-repository.js';
import type { CheckpointRepository } from '../repositories/checkpoint-repository.js';
import type { CheckpointVerificationRepository } from '../repositories/checkpoint-verification-repository.js';
import type { LocationRepository } from '../repositories/location-repository.js';
import type { PhotoRepository } from '../repositories/photo-repository.js';
import type { ReportRepository } from '../repositories/report-repository.js';
import type { QueuePolicy, SyncQueueRepository, SyncStatistics } from '../repositories/sync-queue-repository.js';
import type { TimeRecordRepository } from '../repositories/time-record-repository.js';
import type { RemoteApi } from './remote-api.js';
import type { LocationBatchResponse } from '../../../shared/schema.js';
import { SyncResult } from './sync-result.js';
import { CircuitBreaker, CircuitOpenError, type CircuitBreakerConfig, type CircuitSnapshot } from '../utils/retry.js';
import { getLogger } from '../utils/logger.js';
import {
  AppError,
  StorageError,
  TransientNetworkError,
  UnauthorizedError,
  ValidationError,
  toError,
} from '../../../shared/errors.js';

const logger = getLogger('SyncEngine');

export interface SyncEngineOptions extends QueuePolicy {
  locationBatchSize: number;
  /** Consecutive transient failures after which a drain gives up early. */
  maxConsecutiveFailures?: number;
  circuitBreaker?: Partial<CircuitBreakerConfig>;
  now?: () => Date;
}

export interface SyncRepositories {
  timeRecords: TimeRecordRepository;
  locations: LocationRepository;
  photos: PhotoRepository;
  reports: ReportRepository;
  verifications: CheckpointVerificationRepository;
  checkpoints: CheckpointRepository;
  syncQueue: SyncQueueRepository;
}

export interface SyncRunOptions {
  signal?: AbortSignal;
}

interface PreparedItem {
  isSynced: boolean;
  remoteId: string | null;
  push(signal?: AbortSignal): Promise<string>;
  commit(remoteId: string, synced: boolean): void;
}

interface EntitySyncHandler {
  /** Entities whose business fields change after sync are pushed again. */
  resubmitsUpdates: boolean;
  prepare(entityId: string): PreparedItem | undefined;
}

type ItemOutcome = 'ok' | 'transient' | 'stop';

function createHandler<T extends Syncable & { id: K }, K extends EntityKey, R>(
  repo: SyncableRepository<T, K, R>,
  push: (entity: T, signal?: AbortSignal) => Promise<string>,
  options: { resubmitsUpdates?: boolean; afterCommit?: (entity: T) => void } = {}
): EntitySyncHandler {
  return {
    resubmitsUpdates: options.resubmitsUpdates ?? false,
    prepare(entityId) {
      const entity = repo.getByQueueKey(entityId);
      if (!entity) return undefined;
      return {
        isSynced: entity.isSynced,
        remoteId: entity.remoteId,
        push: signal => push(entity, signal),
        commit: (remoteId, synced) => {
          repo.updateSyncStatus(entity.id, synced, remoteId);
          options.afterCommit?.(entity);
        },
      };
    },
  };
}

function isTransientNetwork(error: unknown): boolean {
  return error instanceof TransientNetworkError;
}

function isRetryable(error: unknown): boolean {
  return isTransientNetwork(error) || !(error instanceof AppError);
}

export class SyncEngine {
  private db: Database;
  private repos: SyncRepositories;
  private api: RemoteApi;
  private options: SyncEngineOptions;
  private circuitBreaker: CircuitBreaker;
  private handlers: Record<EntityType, EntitySyncHandler>;
  private inFlight = new Map<EntityType, Promise<SyncResult>>();
  private maxConsecutiveFailures: number;

  constructor(db: Database, repos: SyncRepositories, api: RemoteApi, options: SyncEngineOptions) {
    this.db = db;
    this.repos = repos;
    this.api = api;
    this.options = options;
    this.maxConsecutiveFailures = options.maxConsecutiveFailures ?? 3;
    this.circuitBreaker = new CircuitBreaker('patrol-sync', {
      failureThreshold: 5,
      recoveryTimeMs: 60000,
      halfOpenMaxAttempts: 3,
      now: () => this.now().getTime(),
      ...options.circuitBreaker,
    });
    this.handlers = this.createHandlers();
  }

  private now(): Date {
    return this.options.now ? this.options.now() : new Date();
  }

  private createHandlers(): Record<EntityType, EntitySyncHandler> {
    const { timeRecords, locations, photos, reports, verifications, checkpoints } = this.repos;

    return {
      TimeRecord: createHandler(timeRecords, (record, signal) =>
        this.api.submitTimeRecord(record, { signal })
      ),
      // Drains send batches; syncEntity pushes a single location through here.
      LocationRecord: createHandler(locations, async (record, signal) => {
        const response = await this.api.submitLocationBatch([record], { signal });
        const remoteId = response.remoteIds[String(record.id)];
        if (!response.syncedIds.includes(record.id) || !remoteId) {
          throw new ValidationError(`Location ${record.id} rejected by server`);
        }
        return remoteId;
      }),
      Photo: createHandler(photos, (photo, signal) => this.pushPhoto(photo, signal), {
        afterCommit: photo => photos.updateSyncProgress(photo.id, 100),
      }),
      ActivityReport: createHandler(reports, (report, signal) =>
        report.remoteId
          ? this.api.updateReport(report.remoteId, report, { signal })
          : this.api.submitReport(report, { signal }),
        { resubmitsUpdates: true }
      ),
      CheckpointVerification: createHandler(verifications, async (verification, signal) => {
        const checkpoint = checkpoints.getById(verification.checkpointId);
        if (!checkpoint?.remoteId) {
          throw new ValidationError(`Checkpoint ${verification.checkpointId} is not known to the server`);
        }
        const result = await this.api.verifyCheckpoint(verification, checkpoint.remoteId, { signal });
        return result.remoteId;
      }),
    };
  }

  private async pushPhoto(photo: Photo, signal?: AbortSignal): Promise<string> {
    let content: Buffer;
    try {
      content = await readFile(photo.filePath);
    } catch (error) {
      const cause = toError(error);
      if ('code' in cause && cause.code === 'ENOENT') {
        throw new ValidationError(`Photo file missing: ${photo.filePath}`);
      }
      throw new StorageError(`Failed to read photo ${photo.id}: ${cause.message}`, cause);
    }

    this.repos.photos.updateSyncProgress(photo.id, 0);
    return this.api.uploadPhoto(photo, content, {
      signal,
      onProgress: percent => this.repos.photos.updateSyncProgress(photo.id, percent),
    });
  }

  // ==========================================================================
  // Drains
  // ==========================================================================

  /** Drains every entity type, highest priority first. */
  async syncAll(options: SyncRunOptions = {}): Promise<SyncResult> {
    const total = new SyncResult();
    const ordered = [...ENTITY_TYPES].sort((a, b) => SYNC_PRIORITY[b] - SYNC_PRIORITY[a]);

    for (const entityType of ordered) {
      const result = await this.syncEntityType(entityType, options);
      total.merge(result);
      if (result.authRequired || result.cancelled) break;
    }

    total.pendingCount = this.repos.syncQueue.countPending(this.options.maxRetries);
    logger.info('Sync cycle complete', {
      synced: total.successCount,
      failed: total.failureCount,
      pending: total.pendingCount,
      authRequired: total.authRequired,
      cancelled: total.cancelled,
    });
    return total;
  }

  /** Single-flight per entity type: a concurrent call joins the running drain. */
  syncEntityType(entityType: EntityType, options: SyncRunOptions = {}): Promise<SyncResult> {
    const running = this.inFlight.get(entityType);
    if (running) {
      logger.debug('Drain already in progress, joining', { entityType });
      return running;
    }

    const drain = this.drain(entityType, options.signal).finally(() => {
      this.inFlight.delete(entityType);
    });
    this.inFlight.set(entityType, drain);
    return drain;
  }

  /**
   * Pushes one queued entity now, ignoring its backoff window. Waits for a
   * running drain of the same type first; a row parked at the retry cap is
   * left for `retryFailed`.
   */
  async syncEntity(entityType: EntityType, entityId: string, options: SyncRunOptions = {}): Promise<SyncResult> {
    for (let running = this.inFlight.get(entityType); running; running = this.inFlight.get(entityType)) {
      logger.debug('Waiting for running drain', { entityType, entityId });
      await running;
    }

    const push = this.pushOne(entityType, entityId, options.signal).finally(() => {
      this.inFlight.delete(entityType);
    });
    this.inFlight.set(entityType, push);
    return push;
  }

  isSyncing(entityType?: EntityType): boolean {
    return entityType ? this.inFlight.has(entityType) : this.inFlight.size > 0;
  }

  private async drain(entityType: EntityType, signal?: AbortSignal): Promise<SyncResult> {
    const result = new SyncResult();

    const circuit = this.circuitBreaker.snapshot();
    if (circuit.state === 'OPEN') {
      logger.debug(`Circuit breaker OPEN, skipping ${entityType} (retry in ${Math.ceil(circuit.retryInMs / 1000)}s)`);
      result.pendingCount = this.repos.syncQueue.countPending(this.options.maxRetries, entityType);
      return result;
    }

    if (entityType === 'LocationRecord') {
      await this.drainLocations(result, signal);
    } else {
      await this.drainItems(entityType, result, signal);
    }

    result.pendingCount = this.repos.syncQueue.countPending(this.options.maxRetries, entityType);
    return result;
  }

  private async pushOne(entityType: EntityType, entityId: string, signal?: AbortSignal): Promise<SyncResult> {
    const result = new SyncResult();
    const item = this.repos.syncQueue.getByEntity(entityType, entityId);

    if (!item) {
      logger.debug('Nothing queued for entity', { entityType, entityId });
    } else if (item.retryCount >= this.options.maxRetries) {
      logger.debug('Entity parked at the retry cap', { entityType, entityId });
    } else if (signal?.aborted) {
      result.cancelled = true;
    } else {
      await this.processItem(item, result, signal);
    }

    result.pendingCount = this.repos.syncQueue.countPending(this.options.maxRetries, entityType);
    return result;
  }

  private async drainItems(entityType: EntityType, result: SyncResult, signal?: AbortSignal): Promise<void> {
    const items = this.repos.syncQueue.getDue(this.options, this.now().getTime(), entityType);
    if (items.length === 0) return;

    logger.debug(`Processing ${items.length} ${entityType} items`);
    let consecutiveFailures = 0;

    for (const item of items) {
      if (signal?.aborted) {
        result.cancelled = true;
        break;
      }

      const outcome = await this.processItem(item, result, signal);
      if (outcome === 'stop') break;

      consecutiveFailures = outcome === 'transient' ? consecutiveFailures + 1 : 0;
      if (consecutiveFailures >= this.maxConsecutiveFailures) {
        logger.warn('Max consecutive failures reached, pausing drain', { entityType });
        break;
      }
    }
  }

  private async processItem(item: SyncQueueItem, result: SyncResult, signal?: AbortSignal): Promise<ItemOutcome> {
    const handler = this.handlers[item.entityType];
    const prepared = handler.prepare(item.entityId);

    if (!prepared) {
      logger.debug('Entity no longer exists, dropping queue row', { entityType: item.entityType, entityId: item.entityId });
      this.repos.syncQueue.remove(item.id);
      return 'ok';
    }

    if (prepared.remoteId && (prepared.isSynced || !handler.resubmitsUpdates)) {
      this.commitAlreadySynced(item, prepared, prepared.remoteId);
      result.recordSuccess(item.entityType, item.entityId);
      return 'ok';
    }

    this.repos.syncQueue.markAttempt(item.id, this.now());

    try {
      const remoteId = await this.circuitBreaker.execute(() => prepared.push(signal), isTransientNetwork);
      this.commitSuccess(item, prepared, remoteId);
      result.recordSuccess(item.entityType, item.entityId);
      logger.debug(`${item.entityType} synced`, { entityId: item.entityId, remoteId });
      return 'ok';
    } catch (error) {
      return this.handleFailure(item, error, result, signal);
    }
  }

  private async drainLocations(result: SyncResult, signal?: AbortSignal): Promise<void> {
    const { syncQueue, locations } = this.repos;
    const processed = new Set<number>();
    let consecutiveFailures = 0;

    while (true) {
      if (signal?.aborted) {
        result.cancelled = true;
        return;
      }

      const due = syncQueue.getDue(this.options, this.now().getTime(), 'LocationRecord')
        .filter(item => !processed.has(item.id))
        .slice(0, this.options.locationBatchSize);
      if (due.length === 0) return;

      const batch: Array<{ item: SyncQueueItem; prepared: PreparedItem; id: number }> = [];
      for (const item of due) {
        processed.add(item.id);
        const prepared = this.handlers.LocationRecord.prepare(item.entityId);
        if (!prepared) {
          syncQueue.remove(item.id);
          continue;
        }
        if (prepared.remoteId) {
          this.commitAlreadySynced(item, prepared, prepared.remoteId);
          result.recordSuccess(item.entityType, item.entityId);
          continue;
        }
        batch.push({ item, prepared, id: locations.keyFromQueue(item.entityId) });
      }
      if (batch.length === 0) continue;

      const records = batch.flatMap(b => {
        const record = locations.getById(b.id);
        return record ? [record] : [];
      });
      for (const { item } of batch) {
        syncQueue.markAttempt(item.id, this.now());
      }

      let response: LocationBatchResponse;
      try {
        response = await this.circuitBreaker.execute(
          () => this.api.submitLocationBatch(records, { signal }),
          isTransientNetwork
        );
      } catch (error) {
        let outcome: ItemOutcome = 'ok';
        for (const { item } of batch) {
          outcome = this.handleFailure(item, error, result, signal);
          if (outcome === 'stop') break;
        }
        if (outcome === 'stop') return;
        consecutiveFailures = outcome === 'transient' ? consecutiveFailures + 1 : 0;
        if (consecutiveFailures >= this.maxConsecutiveFailures) {
          logger.warn('Max consecutive failures reached, pausing location drain');
          return;
        }
        continue;
      }

      consecutiveFailures = 0;
      const synced = new Set(response.syncedIds);
      const rejected = new Set(response.failedIds);

      for (const { item, prepared, id } of batch) {
        const remoteId = response.remoteIds[String(id)];
        if (synced.has(id) && remoteId) {
          this.commitSuccess(item, prepared, remoteId);
          result.recordSuccess(item.entityType, item.entityId);
        } else {
          const message = rejected.has(id) ? 'Rejected by server' : 'Missing from batch response';
          syncQueue.markFailed(item.id, message, this.now());
          result.recordFailure(item.entityType, item.entityId, message, false);
        }
      }

      logger.debug('Location batch uploaded', { synced: synced.size, failed: batch.length - synced.size });
    }
  }

  // ==========================================================================
  // Outcomes
  // ==========================================================================

  /**
   * Marks the entity synced and drops its queue row in one transaction. When
   * the entity was modified while the upload ran (enqueue cleared
   * LastAttempt), the RemoteId is kept but the row stays queued.
   */
  private commitSuccess(item: SyncQueueItem, prepared: PreparedItem, remoteId: string): void {
    const { syncQueue } = this.repos;
    this.db.transaction(() => {
      const current = syncQueue.getByEntity(item.entityType, item.entityId);
      const modifiedInFlight = current !== undefined && current.lastAttempt === null;
      prepared.commit(remoteId, !modifiedInFlight);
      if (!modifiedInFlight) {
        syncQueue.removeByEntity(item.entityType, item.entityId);
      }
    });
  }

  private commitAlreadySynced(item: SyncQueueItem, prepared: PreparedItem, remoteId: string): void {
    this.db.transaction(() => {
      prepared.commit(remoteId, true);
      this.repos.syncQueue.remove(item.id);
    });
  }

  private handleFailure(item: SyncQueueItem, error: unknown, result: SyncResult, signal?: AbortSignal): ItemOutcome {
    const { syncQueue } = this.repos;
    const err = toError(error);
    const context = { entityType: item.entityType, entityId: item.entityId, retryCount: item.retryCount };

    if (error instanceof CircuitOpenError) {
      logger.debug(err.message, context);
      return 'stop';
    }

    if (error instanceof UnauthorizedError) {
      logger.warn('Authentication required, stopping drain', context);
      syncQueue.recordError(item.id, err.message);
      result.authRequired = true;
      result.recordFailure(item.entityType, item.entityId, err.message, false);
      return 'stop';
    }

    if (error instanceof StorageError) {
      throw error;
    }

    if (signal?.aborted) {
      syncQueue.markFailed(item.id, err.message, this.now());
      result.cancelled = true;
      result.recordFailure(item.entityType, item.entityId, err.message, false);
      return 'stop';
    }

    if (isRetryable(error)) {
      logger.warn(`Sync failed for ${item.entityType}/${item.entityId}, will retry`, { ...context, error: err.message });
      syncQueue.markFailed(item.id, err.message, this.now());
      result.recordFailure(item.entityType, item.entityId, err.message, false);
      return 'transient';
    }

    logger.error(`Sync rejected for ${item.entityType}/${item.entityId}`, err, context);
    syncQueue.markTerminal(item.id, err.message, this.options.maxRetries, this.now());
    result.recordFailure(item.entityType, item.entityId, err.message, true);
    return 'ok';
  }

  // ==========================================================================
  // Maintenance
  // ==========================================================================

  getSyncStatistics(): SyncStatistics {
    return this.repos.syncQueue.getStatistics(this.options.maxRetries);
  }

  /** Re-arms rows parked after a backend rejection. */
  retryFailed(entityType?: EntityType): number {
    const count = this.repos.syncQueue.rearmTerminal(this.options.maxRetries, entityType);
    if (count > 0) {
      logger.info('Re-armed failed sync items', { count, entityType });
    }
    return count;
  }

  purgeTerminalItems(olderThanMs: number): number {
    const cutoff = new Date(this.now().getTime() - olderThanMs);
    return this.repos.syncQueue.purgeTerminal(this.options.maxRetries, cutoff);
  }

  getCircuitState(): CircuitSnapshot {
    return this.circuitBreaker.snapshot();
  }
}
