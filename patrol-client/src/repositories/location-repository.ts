import { SyncableRepository, fromFlag, numericKey, toFlag } from './base-repository.js';
import type { LocationRecord } from '../models.js';
import { SYNC_PRIORITY } from '../models.js';

interface LocationRecordRow {
  Id: number;
  UserId: string;
  Timestamp: string;
  Latitude: number;
  Longitude: number;
  Accuracy: number | null;
  IsSynced: number;
  RemoteId: string | null;
}

export class LocationRepository extends SyncableRepository<LocationRecord, number, LocationRecordRow> {
  protected readonly table = 'LocationRecord';
  readonly entityType = 'LocationRecord';

  protected fromRow(row: LocationRecordRow): LocationRecord {
    return {
      id: row.Id,
      userId: row.UserId,
      timestamp: row.Timestamp,
      latitude: row.Latitude,
      longitude: row.Longitude,
      accuracy: row.Accuracy,
      isSynced: fromFlag(row.IsSynced),
      remoteId: row.RemoteId,
    };
  }

  protected insertRow(model: LocationRecord): number {
    const result = this.db.run(
      `INSERT INTO LocationRecord (UserId, Timestamp, Latitude, Longitude, Accuracy, IsSynced, RemoteId)
       VALUES (?, ?, ?, ?, ?, ?, ?)`,
      [model.userId, model.timestamp, model.latitude, model.longitude, model.accuracy, toFlag(model.isSynced), model.remoteId]
    );
    return Number(result.lastInsertRowid);
  }

  protected updateRow(model: LocationRecord): number {
    return this.db.run(
      `UPDATE LocationRecord SET UserId = ?, Timestamp = ?, Latitude = ?, Longitude = ?, Accuracy = ?, IsSynced = 0
       WHERE Id = ?`,
      [model.userId, model.timestamp, model.latitude, model.longitude, model.accuracy, model.id]
    ).changes;
  }

  keyFromQueue(entityId: string): number {
    return numericKey(entityId);
  }

  /** Inserts all records and their queue rows in one transaction. */
  saveBatch(records: LocationRecord[]): number[] {
    return this.inTransaction('saveBatch', () =>
      records.map(record => {
        const id = this.insertRow({ ...record, id: 0 });
        this.syncQueue.enqueue(this.entityType, String(id), SYNC_PRIORITY.LocationRecord);
        return id;
      })
    );
  }

  getLatestForUser(userId: string): LocationRecord | undefined {
    return this.inTransaction('getLatestForUser', () =>
      this.queryOne(
        'SELECT * FROM LocationRecord WHERE UserId = ? ORDER BY Timestamp DESC, Id DESC LIMIT 1',
        [userId]
      )
    );
  }

  getByRange(userId: string, from: string, to: string): LocationRecord[] {
    return this.inTransaction('getByRange', () =>
      this.query(
        'SELECT * FROM LocationRecord WHERE UserId = ? AND Timestamp >= ? AND Timestamp <= ? ORDER BY Timestamp ASC, Id ASC',
        [userId, from, to]
      )
    );
  }

  /** Prunes synced history. Unsynced rows are never removed. */
  deleteSyncedOlderThan(cutoff: Date): number {
    return this.inTransaction('deleteSyncedOlderThan', () =>
      this.db.run('DELETE FROM LocationRecord WHERE IsSynced = 1 AND Timestamp < ?', [cutoff.toISOString()]).changes
    );
  }
}
