/**
 * Checkpoint verification and patrol progress
 *
 * A user verifies each checkpoint of a location at most once. Verifying again
 * returns the stored verification unchanged. An optional proximity radius
 * rejects verifications made too far from the checkpoint.
 */

import type { Database } from '../db/database.js';
import type { CheckpointRepository } from '../repositories/checkpoint-repository.js';
import type { CheckpointVerificationRepository } from '../repositories/checkpoint-verification-repository.js';
import type { PatrolLocationRepository } from '../repositories/patrol-location-repository.js';
import type { Checkpoint, CheckpointVerification, PatrolLocation } from '../models.js';
import { derivePatrolStatus, type PatrolStatus } from '../../../shared/patrol-status.js';
import { distanceMeters, isValidCoordinate, withinRadius } from '../../../shared/geo.js';
import { NotFoundError, ValidationError } from '../../../shared/errors.js';
import { getLogger } from '../utils/logger.js';

const logger = getLogger('PatrolService');

export type VerificationStatus = 'Verified' | 'AlreadyVerified';

export interface VerificationOutcome {
  verification: CheckpointVerification;
  status: VerificationStatus;
}

export interface CheckpointWithStatus extends Checkpoint {
  isVerified: boolean;
  verifiedAt: string | null;
}

export interface PatrolServiceOptions {
  /** Null or undefined disables the distance check. */
  proximityRadiusMeters?: number | null;
}

export class PatrolService {
  private readonly proximityRadiusMeters: number | null;

  constructor(
    private readonly db: Database,
    private readonly locations: PatrolLocationRepository,
    private readonly checkpoints: CheckpointRepository,
    private readonly verifications: CheckpointVerificationRepository,
    options: PatrolServiceOptions = {}
  ) {
    this.proximityRadiusMeters = options.proximityRadiusMeters ?? null;
  }

  verifyCheckpoint(
    userId: string,
    checkpointId: number,
    timestamp: Date,
    latitude: number,
    longitude: number
  ): VerificationOutcome {
    if (!userId) {
      throw new ValidationError('User id is required', 'userId');
    }
    if (!isValidCoordinate(latitude, longitude)) {
      throw new ValidationError('Invalid coordinates', 'latitude');
    }

    return this.db.transaction(() => {
      const checkpoint = this.checkpoints.getById(checkpointId);
      if (!checkpoint) {
        throw new NotFoundError(`Checkpoint ${checkpointId} not found`);
      }

      const existing = this.verifications.getByUserAndCheckpoint(userId, checkpointId);
      if (existing) {
        logger.debug('Checkpoint already verified', { userId, checkpointId });
        return { verification: existing, status: 'AlreadyVerified' };
      }

      if (this.proximityRadiusMeters !== null) {
        const distance = distanceMeters({ latitude, longitude }, checkpoint);
        if (distance > this.proximityRadiusMeters) {
          throw new ValidationError(
            `Too far from checkpoint (${Math.round(distance)}m, limit ${this.proximityRadiusMeters}m)`,
            'latitude'
          );
        }
      }

      const verification: CheckpointVerification = {
        id: 0,
        userId,
        checkpointId,
        timestamp: timestamp.toISOString(),
        latitude,
        longitude,
        isSynced: false,
        remoteId: null,
      };
      verification.id = this.verifications.save(verification);

      logger.info('Checkpoint verified', { userId, checkpointId, id: verification.id });
      return { verification, status: 'Verified' };
    });
  }

  getPatrolStatus(locationId: number, userId: string): PatrolStatus {
    if (!this.locations.getById(locationId)) {
      throw new NotFoundError(`Patrol location ${locationId} not found`);
    }
    const total = this.checkpoints.countByLocation(locationId);
    const verified = this.verifications.getByUserAndLocation(userId, locationId);
    return derivePatrolStatus(locationId, total, verified.map(v => v.timestamp));
  }

  isCheckpointVerified(userId: string, checkpointId: number): boolean {
    return this.verifications.getByUserAndCheckpoint(userId, checkpointId) !== undefined;
  }

  getLocations(): PatrolLocation[] {
    return this.locations.getAll();
  }

  getLocation(locationId: number): PatrolLocation {
    const location = this.locations.getById(locationId);
    if (!location) {
      throw new NotFoundError(`Patrol location ${locationId} not found`);
    }
    return location;
  }

  getCheckpointsWithStatus(locationId: number, userId: string): CheckpointWithStatus[] {
    this.getLocation(locationId);
    const verified = new Map(
      this.verifications.getByUserAndLocation(userId, locationId).map(v => [v.checkpointId, v.timestamp])
    );
    return this.checkpoints.getByLocation(locationId).map(checkpoint => ({
      ...checkpoint,
      isVerified: verified.has(checkpoint.id),
      verifiedAt: verified.get(checkpoint.id) ?? null,
    }));
  }

  getNearbyCheckpoints(latitude: number, longitude: number, radiusMeters: number): Checkpoint[] {
    validateNearbyQuery(latitude, longitude, radiusMeters);
    return withinRadius({ latitude, longitude }, this.checkpoints.getAll(), radiusMeters);
  }

  getVerifications(userId: string): CheckpointVerification[] {
    return this.verifications.getForUser(userId);
  }
}

function validateNearbyQuery(latitude: number, longitude: number, radiusMeters: number): void {
  if (!isValidCoordinate(latitude, longitude)) {
    throw new ValidationError('Invalid coordinates', 'latitude');
  }
  if (!(radiusMeters > 0)) {
    throw new ValidationError('Radius must be greater than 0', 'radius');
  }
}
