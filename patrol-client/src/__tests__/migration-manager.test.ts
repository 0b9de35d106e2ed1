import { describe, it, expect, afterEach } from 'vitest';
import { MigrationManager, applyMigrations, type Migration } from '../db/migration-manager.js';
import { Database } from '../db/database.js';
import { DATABASE_VERSION } from '../db/schema.js';

interface Recorder {
  applied: number[];
}

function migration(version: number, fail = false): Migration<Recorder> {
  return {
    version,
    description: `Migration ${version}`,
    apply(recorder) {
      if (fail) {
        throw new Error(`boom ${version}`);
      }
      recorder.applied.push(version);
    },
  };
}

describe('MigrationManager', () => {
  it('applies pending migrations in ascending version order', () => {
    const recorder: Recorder = { applied: [] };

    const reached = applyMigrations(recorder, 0, [migration(1.2), migration(1.0), migration(1.1)]);

    expect(recorder.applied).toEqual([1.0, 1.1, 1.2]);
    expect(reached).toBe(1.2);
  });

  it('skips migrations at or below the current version', () => {
    const recorder: Recorder = { applied: [] };

    const reached = applyMigrations(recorder, 2.0, [migration(1.0), migration(1.5)]);

    expect(recorder.applied).toEqual([]);
    expect(reached).toBe(2.0);
  });

  it('reports each version as it lands and rethrows the first failure', () => {
    const recorder: Recorder = { applied: [] };
    const reported: number[] = [];
    const manager = new MigrationManager([migration(1.0), migration(1.1, true), migration(1.2)]);

    expect(() => manager.apply(recorder, 0, v => reported.push(v))).toThrow('boom 1.1');
    expect(recorder.applied).toEqual([1.0]);
    expect(reported).toEqual([1.0]);
  });

  it('rejects duplicate versions', () => {
    expect(() => new MigrationManager([migration(1.0), migration(1.0)])).toThrow('Duplicate migration version 1');
  });

  it('knows the latest version', () => {
    expect(new MigrationManager([migration(1.1), migration(1.3)]).latestVersion()).toBe(1.3);
    expect(new MigrationManager<Recorder>([]).latestVersion()).toBe(0);
  });
});

describe('Database', () => {
  let db: Database | null = null;

  afterEach(() => {
    db?.close();
    db = null;
  });

  it('creates the schema at the latest version', () => {
    db = new Database(':memory:');

    expect(db.initialize()).toBe(DATABASE_VERSION);
    expect(db.getVersion()).toBe(DATABASE_VERSION);
    expect(db.tableExists('SyncQueue')).toBe(true);
    expect(db.columnExists('Photo', 'SyncProgress')).toBe(true);
    expect(db.columnExists('User', 'IsActive')).toBe(true);
  });

  it('is a no-op when run again', () => {
    db = new Database(':memory:');
    db.initialize();

    expect(db.initialize()).toBe(DATABASE_VERSION);
  });

  it('rebuilds an empty schema on reset', () => {
    db = new Database(':memory:');
    db.initialize();
    db.run(`INSERT INTO SyncQueue (EntityType, EntityId, Priority) VALUES ('TimeRecord', '1', 100)`);

    expect(db.reset()).toBe(DATABASE_VERSION);
    expect(db.get<{ count: number }>('SELECT COUNT(*) AS count FROM SyncQueue')?.count).toBe(0);
  });

  it('enforces one verification per user and checkpoint', () => {
    db = new Database(':memory:');
    db.initialize();
    db.run(`INSERT INTO PatrolLocation (Name, Latitude, Longitude, LastUpdated) VALUES ('Depot', 0, 0, '2024-01-01T00:00:00.000Z')`);
    db.run(`INSERT INTO Checkpoint (LocationId, Name, Latitude, Longitude, LastUpdated) VALUES (1, 'Gate', 0, 0, '2024-01-01T00:00:00.000Z')`);
    const insert = `INSERT INTO CheckpointVerification (UserId, CheckpointId, Timestamp, Latitude, Longitude)
                    VALUES ('user-1', 1, '2024-01-01T00:00:00.000Z', 0, 0)`;
    db.run(insert);

    expect(() => db?.run(insert)).toThrow();
  });
});
