import { BaseRepository } from './base-repository.js';
import type { PatrolLocation } from '../models.js';

interface PatrolLocationRow {
  Id: number;
  Name: string;
  Latitude: number;
  Longitude: number;
  LastUpdated: string;
  RemoteId: string | null;
}

export interface RemotePatrolLocation {
  remoteId: string;
  name: string;
  latitude: number;
  longitude: number;
  lastUpdated: string;
}

export class PatrolLocationRepository extends BaseRepository<PatrolLocation, number, PatrolLocationRow> {
  protected readonly table = 'PatrolLocation';

  protected fromRow(row: PatrolLocationRow): PatrolLocation {
    return {
      id: row.Id,
      name: row.Name,
      latitude: row.Latitude,
      longitude: row.Longitude,
      lastUpdated: row.LastUpdated,
      remoteId: row.RemoteId,
    };
  }

  protected insertRow(model: PatrolLocation): number {
    const result = this.db.run(
      'INSERT INTO PatrolLocation (Name, Latitude, Longitude, LastUpdated, RemoteId) VALUES (?, ?, ?, ?, ?)',
      [model.name, model.latitude, model.longitude, model.lastUpdated, model.remoteId]
    );
    return Number(result.lastInsertRowid);
  }

  protected updateRow(model: PatrolLocation): number {
    return this.db.run(
      'UPDATE PatrolLocation SET Name = ?, Latitude = ?, Longitude = ?, LastUpdated = ?, RemoteId = ? WHERE Id = ?',
      [model.name, model.latitude, model.longitude, model.lastUpdated, model.remoteId, model.id]
    ).changes;
  }

  getByRemoteId(remoteId: string): PatrolLocation | undefined {
    return this.inTransaction('getByRemoteId', () =>
      this.queryOne('SELECT * FROM PatrolLocation WHERE RemoteId = ?', [remoteId])
    );
  }

  /** Inserts or refreshes the cached copy of a backend location. Returns the local id. */
  upsertFromRemote(remote: RemotePatrolLocation): number {
    return this.inTransaction('upsertFromRemote', () => {
      const existing = this.getByRemoteId(remote.remoteId);
      return this.save({
        id: existing?.id ?? 0,
        name: remote.name,
        latitude: remote.latitude,
        longitude: remote.longitude,
        lastUpdated: remote.lastUpdated,
        remoteId: remote.remoteId,
      });
    });
  }
}
