/**
 * Repository base classes
 *
 * `save` inserts when the key is 0 or '' and updates otherwise; the choice
 * depends on the key alone. Every call runs in a transaction and any
 * non-domain failure surfaces as StorageError. Writes are last-write-wins.
 */

import type { Database, SqlValue } from '../db/database.js';
import type { TableName } from '../db/schema.js';
import type { EntityType, Syncable } from '../models.js';
import { SYNC_PRIORITY } from '../models.js';
import type { SyncQueueRepository } from './sync-queue-repository.js';
import { AppError, NotFoundError, StorageError, toError } from '../../../shared/errors.js';

export type EntityKey = number | string;

export function isNewKey(key: EntityKey): boolean {
  return key === 0 || key === '';
}

export function toFlag(value: boolean): number {
  return value ? 1 : 0;
}

export function fromFlag(value: number | null | undefined): boolean {
  return value === 1;
}

export abstract class BaseRepository<T extends { id: K }, K extends EntityKey, R> {
  protected abstract readonly table: TableName;

  constructor(protected readonly db: Database) {}

  protected abstract fromRow(row: R): T;

  /** Inserts a new row and returns its key. */
  protected abstract insertRow(model: T): K;

  /** Updates an existing row; returns the affected count. */
  protected abstract updateRow(model: T): number;

  protected inTransaction<V>(operation: string, fn: () => V): V {
    try {
      return this.db.transaction(fn);
    } catch (error) {
      if (error instanceof AppError) throw error;
      const cause = toError(error);
      throw new StorageError(`${this.table}.${operation} failed: ${cause.message}`, cause);
    }
  }

  save(model: T): K {
    return this.inTransaction('save', () => {
      if (isNewKey(model.id)) {
        return this.insertRow(model);
      }
      if (this.updateRow(model) === 0) {
        throw new NotFoundError(`${this.table} ${model.id} not found`);
      }
      return model.id;
    });
  }

  getById(id: K): T | undefined {
    return this.inTransaction('getById', () => {
      const row = this.db.get<R>(`SELECT * FROM ${this.table} WHERE Id = ?`, [id]);
      return row ? this.fromRow(row) : undefined;
    });
  }

  getAll(): T[] {
    return this.inTransaction('getAll', () =>
      this.db.all<R>(`SELECT * FROM ${this.table} ORDER BY Id`).map(row => this.fromRow(row))
    );
  }

  delete(id: K): number {
    return this.inTransaction('delete', () =>
      this.db.run(`DELETE FROM ${this.table} WHERE Id = ?`, [id]).changes
    );
  }

  protected query(sql: string, params: SqlValue[] = []): T[] {
    return this.db.all<R>(sql, params).map(row => this.fromRow(row));
  }

  protected queryOne(sql: string, params: SqlValue[] = []): T | undefined {
    const row = this.db.get<R>(sql, params);
    return row ? this.fromRow(row) : undefined;
  }
}

/**
 * Repository for entities mirrored to the backend. Saving writes the entity
 * and its sync queue row in the same transaction.
 */
export abstract class SyncableRepository<
  T extends Syncable & { id: K },
  K extends EntityKey,
  R,
> extends BaseRepository<T, K, R> {
  abstract readonly entityType: EntityType;

  constructor(db: Database, protected readonly syncQueue: SyncQueueRepository) {
    super(db);
  }

  override save(model: T): K {
    return this.inTransaction('save', () => {
      const id = super.save(model);
      this.syncQueue.enqueue(this.entityType, String(id), SYNC_PRIORITY[this.entityType]);
      return id;
    });
  }

  /** Removes the entity and any queue row pointing at it. */
  override delete(id: K): number {
    return this.inTransaction('delete', () => {
      this.syncQueue.removeByEntity(this.entityType, String(id));
      return super.delete(id);
    });
  }

  getPending(): T[] {
    return this.inTransaction('getPending', () =>
      this.query(`SELECT * FROM ${this.table} WHERE IsSynced = 0 ORDER BY Id`)
    );
  }

  getPendingCount(): number {
    return this.inTransaction('getPendingCount', () => {
      const row = this.db.get<{ count: number }>(`SELECT COUNT(*) AS count FROM ${this.table} WHERE IsSynced = 0`);
      return row?.count ?? 0;
    });
  }

  /** Sync bookkeeping only; business fields are untouched. */
  updateSyncStatus(id: K, synced: boolean, remoteId?: string): number {
    return this.inTransaction('updateSyncStatus', () => {
      if (remoteId !== undefined) {
        return this.db.run(
          `UPDATE ${this.table} SET IsSynced = ?, RemoteId = ? WHERE Id = ?`,
          [toFlag(synced), remoteId, id]
        ).changes;
      }
      return this.db.run(`UPDATE ${this.table} SET IsSynced = ? WHERE Id = ?`, [toFlag(synced), id]).changes;
    });
  }

  /** Converts SyncQueue.EntityId back to the table's key type. */
  abstract keyFromQueue(entityId: string): K;

  getByQueueKey(entityId: string): T | undefined {
    return this.getById(this.keyFromQueue(entityId));
  }
}

export function numericKey(entityId: string): number {
  const id = Number(entityId);
  return Number.isInteger(id) ? id : 0;
}
