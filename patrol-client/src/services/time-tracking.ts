import type { TimeRecordRepository } from '../repositories/time-record-repository.js';
import type { ClockType, TimeRecord } from '../models.js';
import { isValidCoordinate } from '../../../shared/geo.js';
import { ConflictError, ValidationError } from '../../../shared/errors.js';
import { getLogger } from '../utils/logger.js';

const logger = getLogger('TimeTracking');

export interface ClockStatus {
  isClockedIn: boolean;
  lastClockIn: string | null;
  lastClockOut: string | null;
}

/**
 * Clock in/out against the local store. ClockIn and ClockOut must alternate
 * per user; the record accepted last decides what is allowed next, even
 * when the device clock has stepped back since.
 */
export class TimeTrackingService {
  constructor(
    private readonly timeRecords: TimeRecordRepository,
    private readonly clock: () => Date = () => new Date()
  ) {}

  clockIn(userId: string, latitude: number, longitude: number): TimeRecord {
    return this.record(userId, 'ClockIn', latitude, longitude);
  }

  clockOut(userId: string, latitude: number, longitude: number): TimeRecord {
    return this.record(userId, 'ClockOut', latitude, longitude);
  }

  getStatus(userId: string): ClockStatus {
    const history = this.timeRecords.getHistory(userId, 50);
    const latest = this.timeRecords.getLatestForUser(userId);
    return {
      isClockedIn: latest?.type === 'ClockIn',
      lastClockIn: history.find(r => r.type === 'ClockIn')?.timestamp ?? null,
      lastClockOut: history.find(r => r.type === 'ClockOut')?.timestamp ?? null,
    };
  }

  getHistory(userId: string, count: number = 20): TimeRecord[] {
    if (!Number.isInteger(count) || count < 1) {
      throw new ValidationError('Count must be a positive integer', 'count');
    }
    return this.timeRecords.getHistory(userId, count);
  }

  getByRange(userId: string, from: Date, to: Date): TimeRecord[] {
    if (from > to) {
      throw new ValidationError('Start date must be before end date', 'from');
    }
    return this.timeRecords.getByRange(userId, from.toISOString(), to.toISOString());
  }

  private record(userId: string, type: ClockType, latitude: number, longitude: number): TimeRecord {
    if (!userId) {
      throw new ValidationError('User id is required', 'userId');
    }
    if (!isValidCoordinate(latitude, longitude)) {
      throw new ValidationError('Invalid coordinates', 'latitude');
    }

    const latest = this.timeRecords.getLatestForUser(userId);
    if (type === 'ClockIn' && latest?.type === 'ClockIn') {
      throw new ConflictError('User is already clocked in');
    }
    if (type === 'ClockOut' && latest?.type !== 'ClockIn') {
      throw new ConflictError('User is not clocked in');
    }

    const record: TimeRecord = {
      id: 0,
      userId,
      type,
      timestamp: this.clock().toISOString(),
      latitude,
      longitude,
      isSynced: false,
      remoteId: null,
    };
    record.id = this.timeRecords.save(record);

    logger.info(`${type} recorded`, { userId, id: record.id });
    return record;
  }
}
