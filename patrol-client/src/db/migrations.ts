import type { Database } from './database.js';
import type { Migration } from './migration-manager.js';
import { CREATE_INDEXES_SQL, CREATE_TABLES_SQL, CREATE_UNIQUE_INDEXES_SQL } from './schema.js';

export const createBaseTables: Migration<Database> = {
  version: 1.0,
  description: 'Create entity tables and indexes',
  apply(db) {
    db.transaction(() => {
      db.exec(CREATE_TABLES_SQL);
      db.exec(CREATE_INDEXES_SQL);
    });
  },
};

export const addPhotoSyncProgress: Migration<Database> = {
  version: 1.1,
  description: 'Add Photo.SyncProgress',
  apply(db) {
    db.addColumnIfMissing('Photo', 'SyncProgress', 'INTEGER NOT NULL DEFAULT 0');
  },
};

export const addReferenceRemoteIds: Migration<Database> = {
  version: 1.2,
  description: 'Add RemoteId to patrol reference tables',
  apply(db) {
    db.transaction(() => {
      db.addColumnIfMissing('PatrolLocation', 'RemoteId', 'TEXT');
      db.addColumnIfMissing('Checkpoint', 'RemoteId', 'TEXT');
    });
  },
};

export const addUserActiveAndUniqueness: Migration<Database> = {
  version: 1.3,
  description: 'Add User.IsActive and uniqueness constraints',
  apply(db) {
    db.transaction(() => {
      db.addColumnIfMissing('User', 'IsActive', 'INTEGER NOT NULL DEFAULT 1');
      // Keep the earliest verification per (UserId, CheckpointId) before the unique index lands.
      db.exec(`
        DELETE FROM CheckpointVerification
        WHERE Id NOT IN (SELECT MIN(Id) FROM CheckpointVerification GROUP BY UserId, CheckpointId)
      `);
      db.exec(`
        DELETE FROM SyncQueue
        WHERE Id NOT IN (SELECT MIN(Id) FROM SyncQueue GROUP BY EntityType, EntityId)
      `);
      db.exec(CREATE_UNIQUE_INDEXES_SQL);
    });
  },
};

export const MIGRATIONS: Migration<Database>[] = [
  createBaseTables,
  addPhotoSyncProgress,
  addReferenceRemoteIds,
  addUserActiveAndUniqueness,
];
