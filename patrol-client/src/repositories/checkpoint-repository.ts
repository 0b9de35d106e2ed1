import { BaseRepository } from './base-repository.js';
import type { Checkpoint } from '../models.js';

interface CheckpointRow {
  Id: number;
  LocationId: number;
  Name: string;
  Latitude: number;
  Longitude: number;
  LastUpdated: string;
  RemoteId: string | null;
}

export interface RemoteCheckpoint {
  remoteId: string;
  name: string;
  latitude: number;
  longitude: number;
  lastUpdated: string;
}

export class CheckpointRepository extends BaseRepository<Checkpoint, number, CheckpointRow> {
  protected readonly table = 'Checkpoint';

  protected fromRow(row: CheckpointRow): Checkpoint {
    return {
      id: row.Id,
      locationId: row.LocationId,
      name: row.Name,
      latitude: row.Latitude,
      longitude: row.Longitude,
      lastUpdated: row.LastUpdated,
      remoteId: row.RemoteId,
    };
  }

  protected insertRow(model: Checkpoint): number {
    const result = this.db.run(
      `INSERT INTO Checkpoint (LocationId, Name, Latitude, Longitude, LastUpdated, RemoteId)
       VALUES (?, ?, ?, ?, ?, ?)`,
      [model.locationId, model.name, model.latitude, model.longitude, model.lastUpdated, model.remoteId]
    );
    return Number(result.lastInsertRowid);
  }

  protected updateRow(model: Checkpoint): number {
    return this.db.run(
      `UPDATE Checkpoint SET LocationId = ?, Name = ?, Latitude = ?, Longitude = ?, LastUpdated = ?, RemoteId = ?
       WHERE Id = ?`,
      [model.locationId, model.name, model.latitude, model.longitude, model.lastUpdated, model.remoteId, model.id]
    ).changes;
  }

  getByLocation(locationId: number): Checkpoint[] {
    return this.inTransaction('getByLocation', () =>
      this.query('SELECT * FROM Checkpoint WHERE LocationId = ? ORDER BY Id', [locationId])
    );
  }

  countByLocation(locationId: number): number {
    return this.inTransaction('countByLocation', () => {
      const row = this.db.get<{ count: number }>('SELECT COUNT(*) AS count FROM Checkpoint WHERE LocationId = ?', [locationId]);
      return row?.count ?? 0;
    });
  }

  getByRemoteId(remoteId: string): Checkpoint | undefined {
    return this.inTransaction('getByRemoteId', () =>
      this.queryOne('SELECT * FROM Checkpoint WHERE RemoteId = ?', [remoteId])
    );
  }

  upsertFromRemote(locationId: number, remote: RemoteCheckpoint): number {
    return this.inTransaction('upsertFromRemote', () => {
      const existing = this.getByRemoteId(remote.remoteId);
      return this.save({
        id: existing?.id ?? 0,
        locationId,
        name: remote.name,
        latitude: remote.latitude,
        longitude: remote.longitude,
        lastUpdated: remote.lastUpdated,
        remoteId: remote.remoteId,
      });
    });
  }
}
