import type { LocationRepository } from '../repositories/location-repository.js';
import type { LocationRecord } from '../models.js';
import { isValidLatitude, isValidLongitude } from '../../../shared/geo.js';
import { ValidationError } from '../../../shared/errors.js';
import { getLogger } from '../utils/logger.js';

const logger = getLogger('LocationTracking');

export interface LocationPoint {
  timestamp: string;
  latitude: number;
  longitude: number;
  accuracy?: number | null;
}

export interface RejectedPoint {
  index: number;
  reason: string;
}

/** Per-item outcome of a recorded batch. */
export class BatchResult {
  readonly savedIds: number[] = [];
  readonly rejected: RejectedPoint[] = [];

  getSuccessCount(): number {
    return this.savedIds.length;
  }

  getFailureCount(): number {
    return this.rejected.length;
  }

  hasFailures(): boolean {
    return this.rejected.length > 0;
  }
}

export function validateLocationPoint(point: LocationPoint): string | null {
  if (!isValidLatitude(point.latitude)) return 'Latitude must be between -90 and 90';
  if (!isValidLongitude(point.longitude)) return 'Longitude must be between -180 and 180';
  if (Number.isNaN(Date.parse(point.timestamp))) return 'Invalid timestamp';
  if (point.accuracy !== undefined && point.accuracy !== null && !(point.accuracy >= 0)) {
    return 'Accuracy must be non-negative';
  }
  return null;
}

export class LocationTrackingService {
  constructor(private readonly locations: LocationRepository) {}

  /**
   * Validates each point on its own; valid points are stored together and
   * invalid ones are reported without failing the batch.
   */
  recordBatch(userId: string, points: LocationPoint[]): BatchResult {
    if (points.length === 0) {
      throw new ValidationError('At least one location is required', 'locations');
    }

    const result = new BatchResult();
    const valid: LocationRecord[] = [];

    points.forEach((point, index) => {
      const reason = validateLocationPoint(point);
      if (reason) {
        result.rejected.push({ index, reason });
        return;
      }
      valid.push({
        id: 0,
        userId,
        timestamp: new Date(point.timestamp).toISOString(),
        latitude: point.latitude,
        longitude: point.longitude,
        accuracy: point.accuracy ?? null,
        isSynced: false,
        remoteId: null,
      });
    });

    if (valid.length > 0) {
      result.savedIds.push(...this.locations.saveBatch(valid));
    }

    if (result.hasFailures()) {
      logger.warn('Location batch partially rejected', {
        userId,
        saved: result.getSuccessCount(),
        rejected: result.getFailureCount(),
      });
    }
    return result;
  }

  getCurrentLocation(userId: string): LocationRecord | undefined {
    return this.locations.getLatestForUser(userId);
  }

  getHistory(userId: string, from: Date, to: Date): LocationRecord[] {
    if (from > to) {
      throw new ValidationError('Start time must be before end time', 'from');
    }
    return this.locations.getByRange(userId, from.toISOString(), to.toISOString());
  }

  pruneSyncedHistory(olderThanMs: number, now: Date = new Date()): number {
    return this.locations.deleteSyncedOlderThan(new Date(now.getTime() - olderThanMs));
  }
}
