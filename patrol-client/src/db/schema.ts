/**
 * SQLite schema for the patrol client
 *
 * Type mappings from the backend:
 * - uuid/varchar → TEXT
 * - timestamp → TEXT (ISO 8601, UTC)
 * - double precision → REAL
 * - boolean → INTEGER (0/1)
 */

export const DATABASE_VERSION = 1.3;

export const TABLE_NAMES = [
  'User',
  'TimeRecord',
  'LocationRecord',
  'Photo',
  'ActivityReport',
  'PatrolLocation',
  'Checkpoint',
  'CheckpointVerification',
  'SyncQueue',
] as const;

export type TableName = typeof TABLE_NAMES[number];

export const CREATE_VERSION_TABLE_SQL = `
CREATE TABLE IF NOT EXISTS VersionInfo (
  Version REAL NOT NULL
);
`;

// =============================================================================
// 1.0 BASE TABLES
// =============================================================================

export const CREATE_TABLES_SQL = `
CREATE TABLE IF NOT EXISTS User (
  Id TEXT PRIMARY KEY,
  PhoneNumber TEXT NOT NULL UNIQUE,
  LastAuthenticated TEXT
);

CREATE TABLE IF NOT EXISTS TimeRecord (
  Id INTEGER PRIMARY KEY AUTOINCREMENT,
  UserId TEXT NOT NULL,
  Type TEXT NOT NULL CHECK (Type IN ('ClockIn', 'ClockOut')),
  Timestamp TEXT NOT NULL,
  Latitude REAL NOT NULL,
  Longitude REAL NOT NULL,
  IsSynced INTEGER NOT NULL DEFAULT 0,
  RemoteId TEXT
);

CREATE TABLE IF NOT EXISTS LocationRecord (
  Id INTEGER PRIMARY KEY AUTOINCREMENT,
  UserId TEXT NOT NULL,
  Timestamp TEXT NOT NULL,
  Latitude REAL NOT NULL,
  Longitude REAL NOT NULL,
  Accuracy REAL,
  IsSynced INTEGER NOT NULL DEFAULT 0,
  RemoteId TEXT
);

CREATE TABLE IF NOT EXISTS Photo (
  Id TEXT PRIMARY KEY,
  UserId TEXT NOT NULL,
  Timestamp TEXT NOT NULL,
  Latitude REAL NOT NULL,
  Longitude REAL NOT NULL,
  FilePath TEXT NOT NULL,
  IsSynced INTEGER NOT NULL DEFAULT 0,
  RemoteId TEXT
);

CREATE TABLE IF NOT EXISTS ActivityReport (
  Id INTEGER PRIMARY KEY AUTOINCREMENT,
  UserId TEXT NOT NULL,
  Text TEXT NOT NULL,
  Timestamp TEXT NOT NULL,
  Latitude REAL NOT NULL,
  Longitude REAL NOT NULL,
  IsSynced INTEGER NOT NULL DEFAULT 0,
  RemoteId TEXT
);

CREATE TABLE IF NOT EXISTS PatrolLocation (
  Id INTEGER PRIMARY KEY AUTOINCREMENT,
  Name TEXT NOT NULL,
  Latitude REAL NOT NULL,
  Longitude REAL NOT NULL,
  LastUpdated TEXT NOT NULL
);

CREATE TABLE IF NOT EXISTS Checkpoint (
  Id INTEGER PRIMARY KEY AUTOINCREMENT,
  LocationId INTEGER NOT NULL REFERENCES PatrolLocation(Id),
  Name TEXT NOT NULL,
  Latitude REAL NOT NULL,
  Longitude REAL NOT NULL,
  LastUpdated TEXT NOT NULL
);

CREATE TABLE IF NOT EXISTS CheckpointVerification (
  Id INTEGER PRIMARY KEY AUTOINCREMENT,
  UserId TEXT NOT NULL,
  CheckpointId INTEGER NOT NULL REFERENCES Checkpoint(Id),
  Timestamp TEXT NOT NULL,
  Latitude REAL NOT NULL,
  Longitude REAL NOT NULL,
  IsSynced INTEGER NOT NULL DEFAULT 0,
  RemoteId TEXT
);

CREATE TABLE IF NOT EXISTS SyncQueue (
  Id INTEGER PRIMARY KEY AUTOINCREMENT,
  EntityType TEXT NOT NULL,
  EntityId TEXT NOT NULL,
  Priority INTEGER NOT NULL DEFAULT 0,
  RetryCount INTEGER NOT NULL DEFAULT 0,
  LastAttempt TEXT,
  ErrorMessage TEXT
);
`;

export const CREATE_INDEXES_SQL = `
CREATE INDEX IF NOT EXISTS IX_TimeRecord_UserId ON TimeRecord(UserId);
CREATE INDEX IF NOT EXISTS IX_TimeRecord_IsSynced ON TimeRecord(IsSynced);
CREATE INDEX IF NOT EXISTS IX_LocationRecord_UserId_Timestamp ON LocationRecord(UserId, Timestamp);
CREATE INDEX IF NOT EXISTS IX_LocationRecord_IsSynced ON LocationRecord(IsSynced);
CREATE INDEX IF NOT EXISTS IX_Photo_UserId ON Photo(UserId);
CREATE INDEX IF NOT EXISTS IX_Photo_IsSynced ON Photo(IsSynced);
CREATE INDEX IF NOT EXISTS IX_ActivityReport_UserId ON ActivityReport(UserId);
CREATE INDEX IF NOT EXISTS IX_ActivityReport_IsSynced ON ActivityReport(IsSynced);
CREATE INDEX IF NOT EXISTS IX_Checkpoint_LocationId ON Checkpoint(LocationId);
CREATE INDEX IF NOT EXISTS IX_CheckpointVerification_CheckpointId ON CheckpointVerification(CheckpointId);
CREATE INDEX IF NOT EXISTS IX_CheckpointVerification_IsSynced ON CheckpointVerification(IsSynced);
CREATE INDEX IF NOT EXISTS IX_SyncQueue_EntityType_EntityId ON SyncQueue(EntityType, EntityId);
CREATE INDEX IF NOT EXISTS IX_SyncQueue_Priority_LastAttempt ON SyncQueue(Priority, LastAttempt);
`;

// =============================================================================
// LATER MIGRATIONS
// =============================================================================

export const CREATE_UNIQUE_INDEXES_SQL = `
CREATE UNIQUE INDEX IF NOT EXISTS UX_CheckpointVerification_UserId_CheckpointId ON CheckpointVerification(UserId, CheckpointId);
CREATE UNIQUE INDEX IF NOT EXISTS UX_SyncQueue_EntityType_EntityId ON SyncQueue(EntityType, EntityId);
CREATE UNIQUE INDEX IF NOT EXISTS UX_PatrolLocation_RemoteId ON PatrolLocation(RemoteId);
CREATE UNIQUE INDEX IF NOT EXISTS UX_Checkpoint_RemoteId ON Checkpoint(RemoteId);
`;
