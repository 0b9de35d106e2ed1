/**
 * Durable outbox of pending remote operations.
 *
 * One row per (EntityType, EntityId). Rows drain by Priority DESC, then
 * LastAttempt ASC with never-attempted rows first. A row is due once its
 * backoff window, derived from RetryCount, has elapsed. Rows at
 * RetryCount >= maxRetries are terminal and never drained again until
 * re-armed.
 */

import type { Database } from '../db/database.js';
import { isEntityType, type EntityType, type SyncQueueItem } from '../models.js';
import { calculateBackoffDelay } from '../utils/retry.js';
import { AppError, StorageError, toError } from '../../../shared/errors.js';

interface SyncQueueRow {
  Id: number;
  EntityType: string;
  EntityId: string;
  Priority: number;
  RetryCount: number;
  LastAttempt: string | null;
  ErrorMessage: string | null;
}

export interface QueuePolicy {
  maxRetries: number;
  baseDelayMs: number;
  maxDelayMs: number;
}

export type RetryBucket = '0' | '1_3' | '4_10' | '10Plus';

export interface SyncStatistics {
  totalItems: number;
  terminalItems: number;
  byEntityType: Partial<Record<EntityType, number>>;
  byPriority: Record<string, number>;
  byRetryCount: Record<RetryBucket, number>;
}

export function retryBucket(retryCount: number): RetryBucket {
  if (retryCount === 0) return '0';
  if (retryCount <= 3) return '1_3';
  if (retryCount <= 10) return '4_10';
  return '10Plus';
}

/** Deterministic backoff (no jitter) so due-ness is stable between calls. */
export function nextAttemptAt(item: Pick<SyncQueueItem, 'retryCount' | 'lastAttempt'>, policy: QueuePolicy): number {
  if (!item.lastAttempt || item.retryCount === 0) return 0;
  const delay = calculateBackoffDelay(item.retryCount, {
    baseDelayMs: policy.baseDelayMs,
    maxDelayMs: policy.maxDelayMs,
    jitterFactor: 0,
  });
  return Date.parse(item.lastAttempt) + delay;
}

function fromRow(row: SyncQueueRow): SyncQueueItem {
  if (!isEntityType(row.EntityType)) {
    throw new StorageError(`Unknown entity type in sync queue: ${row.EntityType}`);
  }
  return {
    id: row.Id,
    entityType: row.EntityType,
    entityId: row.EntityId,
    priority: row.Priority,
    retryCount: row.RetryCount,
    lastAttempt: row.LastAttempt,
    errorMessage: row.ErrorMessage,
  };
}

export class SyncQueueRepository {
  constructor(private readonly db: Database) {}

  private inTransaction<V>(operation: string, fn: () => V): V {
    try {
      return this.db.transaction(fn);
    } catch (error) {
      if (error instanceof AppError) throw error;
      const cause = toError(error);
      throw new StorageError(`SyncQueue.${operation} failed: ${cause.message}`, cause);
    }
  }

  // ==========================================================================
  // Enqueue
  // ==========================================================================

  /**
   * Adds the entity to the queue. An existing row keeps the higher of the two
   * priorities and is re-armed (RetryCount = 0, LastAttempt = NULL) since the
   * entity changed. A NULL LastAttempt on an in-flight row tells the engine
   * the entity was modified while its upload was running.
   */
  enqueue(entityType: EntityType, entityId: string, priority: number): void {
    this.inTransaction('enqueue', () => {
      this.db.run(
        `INSERT INTO SyncQueue (EntityType, EntityId, Priority, RetryCount, LastAttempt, ErrorMessage)
         VALUES (?, ?, ?, 0, NULL, NULL)
         ON CONFLICT(EntityType, EntityId) DO UPDATE SET
           Priority = MAX(Priority, excluded.Priority),
           RetryCount = 0,
           LastAttempt = NULL,
           ErrorMessage = NULL`,
        [entityType, entityId, priority]
      );
    });
  }

  // ==========================================================================
  // Reads
  // ==========================================================================

  getAll(): SyncQueueItem[] {
    return this.inTransaction('getAll', () =>
      this.db.all<SyncQueueRow>('SELECT * FROM SyncQueue ORDER BY Priority DESC, LastAttempt ASC, Id ASC').map(fromRow)
    );
  }

  getByEntity(entityType: EntityType, entityId: string): SyncQueueItem | undefined {
    return this.inTransaction('getByEntity', () => {
      const row = this.db.get<SyncQueueRow>(
        'SELECT * FROM SyncQueue WHERE EntityType = ? AND EntityId = ?',
        [entityType, entityId]
      );
      return row ? fromRow(row) : undefined;
    });
  }

  /** Non-terminal rows whose backoff has elapsed, in drain order. */
  getDue(policy: QueuePolicy, now: number = Date.now(), entityType?: EntityType): SyncQueueItem[] {
    return this.inTransaction('getDue', () => {
      const rows = entityType
        ? this.db.all<SyncQueueRow>(
          `SELECT * FROM SyncQueue WHERE RetryCount < ? AND EntityType = ?
           ORDER BY Priority DESC, LastAttempt ASC, Id ASC`,
          [policy.maxRetries, entityType]
        )
        : this.db.all<SyncQueueRow>(
          `SELECT * FROM SyncQueue WHERE RetryCount < ?
           ORDER BY Priority DESC, LastAttempt ASC, Id ASC`,
          [policy.maxRetries]
        );
      return rows.map(fromRow).filter(item => nextAttemptAt(item, policy) <= now);
    });
  }

  count(): number {
    return this.inTransaction('count', () => {
      const row = this.db.get<{ count: number }>('SELECT COUNT(*) AS count FROM SyncQueue');
      return row?.count ?? 0;
    });
  }

  countPending(maxRetries: number, entityType?: EntityType): number {
    return this.inTransaction('countPending', () => {
      const row = entityType
        ? this.db.get<{ count: number }>(
          'SELECT COUNT(*) AS count FROM SyncQueue WHERE RetryCount < ? AND EntityType = ?',
          [maxRetries, entityType]
        )
        : this.db.get<{ count: number }>('SELECT COUNT(*) AS count FROM SyncQueue WHERE RetryCount < ?', [maxRetries]);
      return row?.count ?? 0;
    });
  }

  // ==========================================================================
  // Outcome bookkeeping
  // ==========================================================================

  remove(id: number): number {
    return this.inTransaction('remove', () => this.db.run('DELETE FROM SyncQueue WHERE Id = ?', [id]).changes);
  }

  removeByEntity(entityType: EntityType, entityId: string): number {
    return this.inTransaction('removeByEntity', () =>
      this.db.run('DELETE FROM SyncQueue WHERE EntityType = ? AND EntityId = ?', [entityType, entityId]).changes
    );
  }

  markAttempt(id: number, now: Date = new Date()): void {
    this.inTransaction('markAttempt', () => {
      this.db.run('UPDATE SyncQueue SET LastAttempt = ? WHERE Id = ?', [now.toISOString(), id]);
    });
  }

  /** Transient failure: one more attempt used, row stays queued. */
  markFailed(id: number, message: string, now: Date = new Date()): void {
    this.inTransaction('markFailed', () => {
      this.db.run(
        'UPDATE SyncQueue SET RetryCount = RetryCount + 1, LastAttempt = ?, ErrorMessage = ? WHERE Id = ?',
        [now.toISOString(), message, id]
      );
    });
  }

  /** Permanent rejection: row is parked at the retry cap. */
  markTerminal(id: number, message: string, maxRetries: number, now: Date = new Date()): void {
    this.inTransaction('markTerminal', () => {
      this.db.run(
        'UPDATE SyncQueue SET RetryCount = MAX(RetryCount, ?), LastAttempt = ?, ErrorMessage = ? WHERE Id = ?',
        [maxRetries, now.toISOString(), message, id]
      );
    });
  }

  /** Records an error without consuming a retry. */
  recordError(id: number, message: string): void {
    this.inTransaction('recordError', () => {
      this.db.run('UPDATE SyncQueue SET ErrorMessage = ? WHERE Id = ?', [message, id]);
    });
  }

  /** Re-arms terminal rows so the next drain picks them up again. */
  rearmTerminal(maxRetries: number, entityType?: EntityType): number {
    return this.inTransaction('rearmTerminal', () => {
      if (entityType) {
        return this.db.run(
          'UPDATE SyncQueue SET RetryCount = 0, ErrorMessage = NULL WHERE RetryCount >= ? AND EntityType = ?',
          [maxRetries, entityType]
        ).changes;
      }
      return this.db.run(
        'UPDATE SyncQueue SET RetryCount = 0, ErrorMessage = NULL WHERE RetryCount >= ?',
        [maxRetries]
      ).changes;
    });
  }

  /** Deletes terminal rows last attempted before the cutoff. */
  purgeTerminal(maxRetries: number, olderThan: Date): number {
    return this.inTransaction('purgeTerminal', () =>
      this.db.run(
        'DELETE FROM SyncQueue WHERE RetryCount >= ? AND LastAttempt < ?',
        [maxRetries, olderThan.toISOString()]
      ).changes
    );
  }

  getStatistics(maxRetries: number): SyncStatistics {
    const items = this.getAll();
    const stats: SyncStatistics = {
      totalItems: items.length,
      terminalItems: 0,
      byEntityType: {},
      byPriority: {},
      byRetryCount: { '0': 0, '1_3': 0, '4_10': 0, '10Plus': 0 },
    };

    for (const item of items) {
      stats.byEntityType[item.entityType] = (stats.byEntityType[item.entityType] ?? 0) + 1;
      const priorityKey = String(item.priority);
      stats.byPriority[priorityKey] = (stats.byPriority[priorityKey] ?? 0) + 1;
      stats.byRetryCount[retryBucket(item.retryCount)]++;
      if (item.retryCount >= maxRetries) stats.terminalItems++;
    }

    return stats;
  }
}
