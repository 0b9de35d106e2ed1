import { SyncableRepository, fromFlag, numericKey, toFlag } from './base-repository.js';
import type { CheckpointVerification } from '../models.js';

interface CheckpointVerificationRow {
  Id: number;
  UserId: string;
  CheckpointId: number;
  Timestamp: string;
  Latitude: number;
  Longitude: number;
  IsSynced: number;
  RemoteId: string | null;
}

export class CheckpointVerificationRepository
  extends SyncableRepository<CheckpointVerification, number, CheckpointVerificationRow> {
  protected readonly table = 'CheckpointVerification';
  readonly entityType = 'CheckpointVerification';

  protected fromRow(row: CheckpointVerificationRow): CheckpointVerification {
    return {
      id: row.Id,
      userId: row.UserId,
      checkpointId: row.CheckpointId,
      timestamp: row.Timestamp,
      latitude: row.Latitude,
      longitude: row.Longitude,
      isSynced: fromFlag(row.IsSynced),
      remoteId: row.RemoteId,
    };
  }

  protected insertRow(model: CheckpointVerification): number {
    const result = this.db.run(
      `INSERT INTO CheckpointVerification (UserId, CheckpointId, Timestamp, Latitude, Longitude, IsSynced, RemoteId)
       VALUES (?, ?, ?, ?, ?, ?, ?)`,
      [model.userId, model.checkpointId, model.timestamp, model.latitude, model.longitude,
        toFlag(model.isSynced), model.remoteId]
    );
    return Number(result.lastInsertRowid);
  }

  protected updateRow(model: CheckpointVerification): number {
    return this.db.run(
      `UPDATE CheckpointVerification SET Timestamp = ?, Latitude = ?, Longitude = ?, IsSynced = 0
       WHERE Id = ?`,
      [model.timestamp, model.latitude, model.longitude, model.id]
    ).changes;
  }

  keyFromQueue(entityId: string): number {
    return numericKey(entityId);
  }

  getByUserAndCheckpoint(userId: string, checkpointId: number): CheckpointVerification | undefined {
    return this.inTransaction('getByUserAndCheckpoint', () =>
      this.queryOne(
        'SELECT * FROM CheckpointVerification WHERE UserId = ? AND CheckpointId = ?',
        [userId, checkpointId]
      )
    );
  }

  /** Verifications by the user for checkpoints of the given location. */
  getByUserAndLocation(userId: string, locationId: number): CheckpointVerification[] {
    return this.inTransaction('getByUserAndLocation', () =>
      this.query(
        `SELECT v.* FROM CheckpointVerification v
         INNER JOIN Checkpoint c ON c.Id = v.CheckpointId
         WHERE v.UserId = ? AND c.LocationId = ?
         ORDER BY v.Timestamp ASC`,
        [userId, locationId]
      )
    );
  }

  getForUser(userId: string): CheckpointVerification[] {
    return this.inTransaction('getForUser', () =>
      this.query('SELECT * FROM CheckpointVerification WHERE UserId = ? ORDER BY Timestamp DESC', [userId])
    );
  }
}
