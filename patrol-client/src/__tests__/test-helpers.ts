import { vi } from 'vitest';
import { Database } from '../db/database.js';
import { SyncQueueRepository } from '../repositories/sync-queue-repository.js';
import { UserRepository } from '../repositories/user-repository.js';
import { TimeRecordRepository } from '../repositories/time-record-repository.js';
import { LocationRepository } from '../repositories/location-repository.js';
import { PhotoRepository } from '../repositories/photo-repository.js';
import { ReportRepository } from '../repositories/report-repository.js';
import { PatrolLocationRepository } from '../repositories/patrol-location-repository.js';
import { CheckpointRepository } from '../repositories/checkpoint-repository.js';
import { CheckpointVerificationRepository } from '../repositories/checkpoint-verification-repository.js';
import type { Repositories } from '../client.js';
import type {
  ActivityReport,
  CheckpointVerification,
  LocationRecord,
  Photo,
  TimeRecord,
} from '../models.js';
import type { CallOptions, RemoteApi, RemoteReference, RemoteVerification, UploadOptions } from '../sync/remote-api.js';
import type { LocationBatchResponse } from '../../../shared/schema.js';

export const USER_ID = 'user-1';
export const BASE_TIME = new Date('2024-03-01T08:00:00.000Z');

export interface TestStore {
  db: Database;
  repos: Repositories;
}

export function createTestStore(): TestStore {
  const db = new Database(':memory:');
  db.initialize();
  const syncQueue = new SyncQueueRepository(db);
  return {
    db,
    repos: {
      users: new UserRepository(db),
      timeRecords: new TimeRecordRepository(db, syncQueue),
      locations: new LocationRepository(db, syncQueue),
      photos: new PhotoRepository(db, syncQueue),
      reports: new ReportRepository(db, syncQueue),
      patrolLocations: new PatrolLocationRepository(db),
      checkpoints: new CheckpointRepository(db),
      verifications: new CheckpointVerificationRepository(db, syncQueue),
      syncQueue,
    },
  };
}

export function newTimeRecord(overrides: Partial<TimeRecord> = {}): TimeRecord {
  return {
    id: 0,
    userId: USER_ID,
    type: 'ClockIn',
    timestamp: BASE_TIME.toISOString(),
    latitude: 40.7128,
    longitude: -74.006,
    isSynced: false,
    remoteId: null,
    ...overrides,
  };
}

export function newLocationRecord(overrides: Partial<LocationRecord> = {}): LocationRecord {
  return {
    id: 0,
    userId: USER_ID,
    timestamp: BASE_TIME.toISOString(),
    latitude: 40.7128,
    longitude: -74.006,
    accuracy: 5,
    isSynced: false,
    remoteId: null,
    ...overrides,
  };
}

export function newReport(overrides: Partial<ActivityReport> = {}): ActivityReport {
  return {
    id: 0,
    userId: USER_ID,
    text: 'North gate secured',
    timestamp: BASE_TIME.toISOString(),
    latitude: 40.7128,
    longitude: -74.006,
    isSynced: false,
    remoteId: null,
    ...overrides,
  };
}

/** Stores a patrol location with one checkpoint per entry. Returns the checkpoint ids. */
export function seedCheckpoints(
  store: TestStore,
  checkpoints: Array<{ name: string; latitude: number; longitude: number; remoteId?: string | null }>
): { locationId: number; checkpointIds: number[] } {
  const locationId = store.repos.patrolLocations.save({
    id: 0,
    name: 'Warehouse District',
    latitude: 40.7128,
    longitude: -74.006,
    lastUpdated: BASE_TIME.toISOString(),
    remoteId: 'location-remote-1',
  });
  const checkpointIds = checkpoints.map(cp =>
    store.repos.checkpoints.save({
      id: 0,
      locationId,
      name: cp.name,
      latitude: cp.latitude,
      longitude: cp.longitude,
      lastUpdated: BASE_TIME.toISOString(),
      remoteId: cp.remoteId ?? null,
    })
  );
  return { locationId, checkpointIds };
}

/**
 * In-process backend. Every call succeeds with a generated id unless a test
 * overrides the mock.
 */
export function createFakeApi() {
  let seq = 0;
  const nextId = (prefix: string) => `${prefix}-${++seq}`;

  return {
    submitTimeRecord: vi.fn(async (_record: TimeRecord, _options?: CallOptions): Promise<string> => nextId('time')),
    submitLocationBatch: vi.fn(
      async (records: LocationRecord[], _options?: CallOptions): Promise<LocationBatchResponse> => ({
        syncedIds: records.map(r => r.id),
        failedIds: [],
        remoteIds: Object.fromEntries(records.map(r => [String(r.id), `loc-${r.id}`])),
      })
    ),
    uploadPhoto: vi.fn(async (_photo: Photo, _content: Buffer, options?: UploadOptions): Promise<string> => {
      options?.onProgress?.(50);
      return nextId('photo');
    }),
    submitReport: vi.fn(async (_report: ActivityReport, _options?: CallOptions): Promise<string> => nextId('report')),
    updateReport: vi.fn(async (remoteId: string, _report: ActivityReport, _options?: CallOptions): Promise<string> => remoteId),
    deleteReport: vi.fn(async (_remoteId: string, _options?: CallOptions): Promise<void> => undefined),
    verifyCheckpoint: vi.fn(
      async (
        _verification: CheckpointVerification,
        _checkpointRemoteId: string,
        _options?: CallOptions
      ): Promise<RemoteVerification> => ({ remoteId: nextId('verification'), status: 'Verified' })
    ),
    getPatrolLocations: vi.fn(async (_options?: CallOptions): Promise<RemoteReference[]> => []),
    getCheckpoints: vi.fn(async (_locationRemoteId: string, _options?: CallOptions): Promise<RemoteReference[]> => []),
  } satisfies RemoteApi;
}

export type FakeApi = ReturnType<typeof createFakeApi>;
