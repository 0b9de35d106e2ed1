import { randomUUID } from 'crypto';
import { SyncableRepository, fromFlag, toFlag } from './base-repository.js';
import type { Photo } from '../models.js';

interface PhotoRow {
  Id: string;
  UserId: string;
  Timestamp: string;
  Latitude: number;
  Longitude: number;
  FilePath: string;
  IsSynced: number;
  SyncProgress: number;
  RemoteId: string | null;
}

export class PhotoRepository extends SyncableRepository<Photo, string, PhotoRow> {
  protected readonly table = 'Photo';
  readonly entityType = 'Photo';

  protected fromRow(row: PhotoRow): Photo {
    return {
      id: row.Id,
      userId: row.UserId,
      timestamp: row.Timestamp,
      latitude: row.Latitude,
      longitude: row.Longitude,
      filePath: row.FilePath,
      isSynced: fromFlag(row.IsSynced),
      syncProgress: row.SyncProgress,
      remoteId: row.RemoteId,
    };
  }

  protected insertRow(model: Photo): string {
    const id = randomUUID();
    this.db.run(
      `INSERT INTO Photo (Id, UserId, Timestamp, Latitude, Longitude, FilePath, IsSynced, SyncProgress, RemoteId)
       VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)`,
      [id, model.userId, model.timestamp, model.latitude, model.longitude, model.filePath,
        toFlag(model.isSynced), model.syncProgress, model.remoteId]
    );
    return id;
  }

  protected updateRow(model: Photo): number {
    return this.db.run(
      `UPDATE Photo SET UserId = ?, Timestamp = ?, Latitude = ?, Longitude = ?, FilePath = ?, IsSynced = 0
       WHERE Id = ?`,
      [model.userId, model.timestamp, model.latitude, model.longitude, model.filePath, model.id]
    ).changes;
  }

  keyFromQueue(entityId: string): string {
    return entityId;
  }

  getForUser(userId: string): Photo[] {
    return this.inTransaction('getForUser', () =>
      this.query('SELECT * FROM Photo WHERE UserId = ? ORDER BY Timestamp DESC', [userId])
    );
  }

  updateSyncProgress(id: string, percent: number): number {
    const clamped = Math.max(0, Math.min(100, Math.round(percent)));
    return this.inTransaction('updateSyncProgress', () =>
      this.db.run('UPDATE Photo SET SyncProgress = ? WHERE Id = ?', [clamped, id]).changes
    );
  }
}
