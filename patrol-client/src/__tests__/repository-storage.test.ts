import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { BASE_TIME, USER_ID, createTestStore, seedCheckpoints, type TestStore } from './test-helpers.js';
import { StorageError } from '../../../shared/errors.js';

describe('repository storage errors', () => {
  let store: TestStore;

  beforeEach(() => {
    store = createTestStore();
  });

  afterEach(() => {
    store.db.close();
  });

  it('refuses to delete a patrol location that still has checkpoints', () => {
    const { locationId, checkpointIds } = seedCheckpoints(store, [
      { name: 'Gate', latitude: 40.7128, longitude: -74.006 },
      { name: 'Dock', latitude: 40.7138, longitude: -74.006 },
    ]);

    expect(() => store.repos.patrolLocations.delete(locationId)).toThrow(StorageError);
    expect(() => store.repos.patrolLocations.delete(locationId)).toThrow('PatrolLocation.delete failed');
    expect(store.repos.patrolLocations.getById(locationId)?.name).toBe('Warehouse District');
    expect(store.repos.checkpoints.getAll().map(cp => cp.id)).toEqual(checkpointIds);
  });

  it('deletes a patrol location once its checkpoints are gone', () => {
    const { locationId, checkpointIds } = seedCheckpoints(store, [
      { name: 'Gate', latitude: 40.7128, longitude: -74.006 },
    ]);

    checkpointIds.forEach(id => store.repos.checkpoints.delete(id));

    expect(store.repos.patrolLocations.delete(locationId)).toBe(1);
  });

  it('rolls back a verification of an unknown checkpoint', () => {
    const save = () =>
      store.repos.verifications.save({
        id: 0,
        userId: USER_ID,
        checkpointId: 999,
        timestamp: BASE_TIME.toISOString(),
        latitude: 40.7128,
        longitude: -74.006,
        isSynced: false,
        remoteId: null,
      });

    expect(save).toThrow(StorageError);
    expect(save).toThrow('CheckpointVerification.save failed: FOREIGN KEY constraint failed');
    expect(store.repos.verifications.getAll()).toEqual([]);
    expect(store.repos.syncQueue.count()).toBe(0);
  });

  it('wraps a closed database in StorageError', () => {
    store.db.close();

    expect(() => store.repos.timeRecords.getLatestForUser(USER_ID)).toThrow(StorageError);
    expect(() => store.repos.timeRecords.getLatestForUser(USER_ID)).toThrow('TimeRecord.getLatestForUser failed');
  });
});
