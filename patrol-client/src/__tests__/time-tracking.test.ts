import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { TimeTrackingService } from '../services/time-tracking.js';
import { BASE_TIME, USER_ID, createTestStore, newTimeRecord, type TestStore } from './test-helpers.js';
import { ConflictError, ValidationError } from '../../../shared/errors.js';

describe('TimeTrackingService', () => {
  let store: TestStore;
  let now: Date;
  let service: TimeTrackingService;

  beforeEach(() => {
    store = createTestStore();
    now = new Date(BASE_TIME);
    service = new TimeTrackingService(store.repos.timeRecords, () => now);
  });

  afterEach(() => {
    store.db.close();
  });

  it('stores a clock-in and queues it for sync', () => {
    const record = service.clockIn(USER_ID, 40.7128, -74.006);

    expect(store.repos.timeRecords.getById(record.id)).toEqual({
      id: record.id,
      userId: USER_ID,
      type: 'ClockIn',
      timestamp: BASE_TIME.toISOString(),
      latitude: 40.7128,
      longitude: -74.006,
      isSynced: false,
      remoteId: null,
    });
    expect(store.repos.syncQueue.getByEntity('TimeRecord', String(record.id))?.priority).toBe(100);
  });

  it('rejects a second clock-in', () => {
    service.clockIn(USER_ID, 40.7128, -74.006);

    expect(() => service.clockIn(USER_ID, 40.7128, -74.006)).toThrow(ConflictError);
  });

  it('rejects a clock-out without a clock-in', () => {
    expect(() => service.clockOut(USER_ID, 40.7128, -74.006)).toThrow('User is not clocked in');
  });

  it('alternates clock-in and clock-out', () => {
    service.clockIn(USER_ID, 40.7128, -74.006);
    now = new Date(BASE_TIME.getTime() + 60_000);
    service.clockOut(USER_ID, 40.7128, -74.006);
    now = new Date(BASE_TIME.getTime() + 120_000);
    service.clockIn(USER_ID, 40.7128, -74.006);

    expect(service.getHistory(USER_ID).map(r => r.type)).toEqual(['ClockIn', 'ClockOut', 'ClockIn']);
  });

  it('keeps alternating when the device clock steps back', () => {
    now = new Date('2024-03-01T10:00:00.000Z');
    service.clockIn(USER_ID, 40.7128, -74.006);
    now = new Date('2024-03-01T09:00:00.000Z');
    service.clockOut(USER_ID, 40.7128, -74.006);
    now = new Date('2024-03-01T09:30:00.000Z');

    expect(() => service.clockOut(USER_ID, 40.7128, -74.006)).toThrow('User is not clocked in');
    expect(service.getStatus(USER_ID).isClockedIn).toBe(false);
    expect(() => service.clockIn(USER_ID, 40.7128, -74.006)).not.toThrow();
    expect(store.repos.timeRecords.getAll().map(r => r.type)).toEqual(['ClockIn', 'ClockOut', 'ClockIn']);
  });

  it('reports the clock status', () => {
    service.clockIn(USER_ID, 40.7128, -74.006);
    now = new Date(BASE_TIME.getTime() + 60_000);
    service.clockOut(USER_ID, 40.7128, -74.006);

    expect(service.getStatus(USER_ID)).toEqual({
      isClockedIn: false,
      lastClockIn: BASE_TIME.toISOString(),
      lastClockOut: now.toISOString(),
    });
  });

  it('validates coordinates', () => {
    expect(() => service.clockIn(USER_ID, 91, 0)).toThrow(ValidationError);
    expect(() => service.clockIn(USER_ID, 0, -181)).toThrow(ValidationError);
    expect(store.repos.syncQueue.count()).toBe(0);
  });

  it('keeps clocks of different users apart', () => {
    service.clockIn(USER_ID, 40.7128, -74.006);

    expect(() => service.clockIn('user-2', 40.7128, -74.006)).not.toThrow();
  });

  it('returns records in a time range oldest first', () => {
    store.repos.timeRecords.save(newTimeRecord({ timestamp: '2024-03-01T10:00:00.000Z' }));
    store.repos.timeRecords.save(newTimeRecord({ type: 'ClockOut', timestamp: '2024-03-01T09:00:00.000Z' }));
    store.repos.timeRecords.save(newTimeRecord({ timestamp: '2024-03-02T09:00:00.000Z' }));

    const records = service.getByRange(
      USER_ID,
      new Date('2024-03-01T00:00:00.000Z'),
      new Date('2024-03-01T23:59:59.999Z')
    );

    expect(records.map(r => r.timestamp)).toEqual(['2024-03-01T09:00:00.000Z', '2024-03-01T10:00:00.000Z']);
  });

  it('rejects an inverted range', () => {
    expect(() => service.getByRange(USER_ID, new Date('2024-03-02'), new Date('2024-03-01'))).toThrow(ValidationError);
  });
});
