import { SyncableRepository, fromFlag, numericKey, toFlag } from './base-repository.js';
import type { ClockType, TimeRecord } from '../models.js';
import { StorageError } from '../../../shared/errors.js';

interface TimeRecordRow {
  Id: number;
  UserId: string;
  Type: string;
  Timestamp: string;
  Latitude: number;
  Longitude: number;
  IsSynced: number;
  RemoteId: string | null;
}

function toClockType(value: string): ClockType {
  if (value === 'ClockIn' || value === 'ClockOut') return value;
  throw new StorageError(`Unknown time record type: ${value}`);
}

export class TimeRecordRepository extends SyncableRepository<TimeRecord, number, TimeRecordRow> {
  protected readonly table = 'TimeRecord';
  readonly entityType = 'TimeRecord';

  protected fromRow(row: TimeRecordRow): TimeRecord {
    return {
      id: row.Id,
      userId: row.UserId,
      type: toClockType(row.Type),
      timestamp: row.Timestamp,
      latitude: row.Latitude,
      longitude: row.Longitude,
      isSynced: fromFlag(row.IsSynced),
      remoteId: row.RemoteId,
    };
  }

  protected insertRow(model: TimeRecord): number {
    const result = this.db.run(
      `INSERT INTO TimeRecord (UserId, Type, Timestamp, Latitude, Longitude, IsSynced, RemoteId)
       VALUES (?, ?, ?, ?, ?, ?, ?)`,
      [model.userId, model.type, model.timestamp, model.latitude, model.longitude, toFlag(model.isSynced), model.remoteId]
    );
    return Number(result.lastInsertRowid);
  }

  protected updateRow(model: TimeRecord): number {
    return this.db.run(
      `UPDATE TimeRecord SET UserId = ?, Type = ?, Timestamp = ?, Latitude = ?, Longitude = ?, IsSynced = 0
       WHERE Id = ?`,
      [model.userId, model.type, model.timestamp, model.latitude, model.longitude, model.id]
    ).changes;
  }

  keyFromQueue(entityId: string): number {
    return numericKey(entityId);
  }

  /** The record accepted last, whatever its timestamp says. */
  getLatestForUser(userId: string): TimeRecord | undefined {
    return this.inTransaction('getLatestForUser', () =>
      this.queryOne(
        'SELECT * FROM TimeRecord WHERE UserId = ? ORDER BY Id DESC LIMIT 1',
        [userId]
      )
    );
  }

  getHistory(userId: string, limit: number): TimeRecord[] {
    return this.inTransaction('getHistory', () =>
      this.query(
        'SELECT * FROM TimeRecord WHERE UserId = ? ORDER BY Timestamp DESC, Id DESC LIMIT ?',
        [userId, limit]
      )
    );
  }

  getByRange(userId: string, from: string, to: string): TimeRecord[] {
    return this.inTransaction('getByRange', () =>
      this.query(
        'SELECT * FROM TimeRecord WHERE UserId = ? AND Timestamp >= ? AND Timestamp <= ? ORDER BY Timestamp ASC, Id ASC',
        [userId, from, to]
      )
    );
  }
}
