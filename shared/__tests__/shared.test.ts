import { describe, it, expect } from 'vitest';
import {
  ConflictError,
  ForbiddenError,
  NotFoundError,
  TransientNetworkError,
  UnauthorizedError,
  ValidationError,
  errorFromStatus,
  isAppError,
  toError,
} from '../errors.js';
import { pageOffset, toPaginatedList, validatePage } from '../pagination.js';
import { derivePatrolState, derivePatrolStatus, getPatrolStateLabel } from '../patrol-status.js';
import { distanceMeters, isValidCoordinate, withinRadius } from '../geo.js';

describe('errors', () => {
  it('rebuilds domain errors from HTTP status codes', () => {
    expect(errorFromStatus(400, 'bad')).toBeInstanceOf(ValidationError);
    expect(errorFromStatus(422, 'bad')).toBeInstanceOf(ValidationError);
    expect(errorFromStatus(401, 'who')).toBeInstanceOf(UnauthorizedError);
    expect(errorFromStatus(403, 'no')).toBeInstanceOf(ForbiddenError);
    expect(errorFromStatus(404, 'gone')).toBeInstanceOf(NotFoundError);
    expect(errorFromStatus(409, 'clash')).toBeInstanceOf(ConflictError);
  });

  it('treats server errors, timeouts and throttling as transient', () => {
    for (const status of [500, 502, 503, 408, 429]) {
      const error = errorFromStatus(status, 'later');
      expect(error).toBeInstanceOf(TransientNetworkError);
      expect(error.status).toBe(status);
    }
  });

  it('keeps the message and names the class', () => {
    const error = errorFromStatus(404, 'Report not found');

    expect(error.message).toBe('Report not found');
    expect(error.name).toBe('NotFoundError');
    expect(isAppError(error)).toBe(true);
    expect(isAppError(new Error('plain'))).toBe(false);
  });

  it('wraps non-errors', () => {
    expect(toError('boom').message).toBe('boom');
    const original = new Error('kept');
    expect(toError(original)).toBe(original);
  });
});

describe('pagination', () => {
  it('computes page metadata', () => {
    expect(toPaginatedList(['a', 'b'], 12, 2, 5)).toEqual({
      items: ['a', 'b'],
      pageNumber: 2,
      pageSize: 5,
      totalCount: 12,
      totalPages: 3,
      hasPreviousPage: true,
      hasNextPage: true,
    });
    expect(toPaginatedList([], 0, 1, 20)).toMatchObject({ totalPages: 0, hasPreviousPage: false, hasNextPage: false });
  });

  it('computes the offset', () => {
    expect(pageOffset(1, 20)).toBe(0);
    expect(pageOffset(3, 20)).toBe(40);
  });

  it('validates page arguments', () => {
    expect(() => validatePage(1, 1)).not.toThrow();
    expect(() => validatePage(1, 100)).not.toThrow();
    expect(() => validatePage(0, 20)).toThrow(ValidationError);
    expect(() => validatePage(1.5, 20)).toThrow(ValidationError);
    expect(() => validatePage(1, 0)).toThrow(ValidationError);
    expect(() => validatePage(1, 101)).toThrow(ValidationError);
  });
});

describe('patrol status', () => {
  it('derives the state from verified and total checkpoints', () => {
    expect(derivePatrolState(3, 0)).toBe('NotStarted');
    expect(derivePatrolState(3, 2)).toBe('InProgress');
    expect(derivePatrolState(3, 3)).toBe('Completed');
    expect(derivePatrolState(0, 0)).toBe('NotStarted');
  });

  it('reports the latest verification time', () => {
    const status = derivePatrolStatus('loc-1', 3, [
      '2024-03-01T08:10:00.000Z',
      '2024-03-01T08:30:00.000Z',
      '2024-03-01T08:20:00.000Z',
    ]);

    expect(status).toEqual({
      locationId: 'loc-1',
      totalCheckpoints: 3,
      verifiedCheckpoints: 3,
      state: 'Completed',
      isComplete: true,
      lastVerificationTime: '2024-03-01T08:30:00.000Z',
    });
  });

  it('labels states for display', () => {
    expect(getPatrolStateLabel('InProgress')).toBe('In progress');
  });
});

describe('geo', () => {
  it('validates coordinate ranges', () => {
    expect(isValidCoordinate(90, 180)).toBe(true);
    expect(isValidCoordinate(-90.0001, 0)).toBe(false);
    expect(isValidCoordinate(0, Number.NaN)).toBe(false);
  });

  it('measures great-circle distance', () => {
    const oneDegree = distanceMeters({ latitude: 0, longitude: 0 }, { latitude: 1, longitude: 0 });

    expect(Math.round(oneDegree)).toBe(111195);
    expect(distanceMeters({ latitude: 10, longitude: 10 }, { latitude: 10, longitude: 10 })).toBe(0);
  });

  it('filters and sorts points by distance', () => {
    const points = [
      { name: 'far', latitude: 0.01, longitude: 0 },
      { name: 'near', latitude: 0.001, longitude: 0 },
      { name: 'mid', latitude: 0.005, longitude: 0 },
    ];

    expect(withinRadius({ latitude: 0, longitude: 0 }, points, 600).map(p => p.name)).toEqual(['near', 'mid']);
  });
});
