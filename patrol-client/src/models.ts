import type { ClockType } from '../../shared/schema.js';

export type { ClockType };

/** Entity types that flow through the sync queue. */
export type EntityType =
  | 'TimeRecord'
  | 'LocationRecord'
  | 'Photo'
  | 'ActivityReport'
  | 'CheckpointVerification';

export const ENTITY_TYPES: readonly EntityType[] = [
  'TimeRecord',
  'CheckpointVerification',
  'LocationRecord',
  'ActivityReport',
  'Photo',
];

/** Higher drains first. */
export const SYNC_PRIORITY: Record<EntityType, number> = {
  TimeRecord: 100,
  CheckpointVerification: 90,
  LocationRecord: 80,
  ActivityReport: 70,
  Photo: 60,
};

export function isEntityType(value: string): value is EntityType {
  return ENTITY_TYPES.some(t => t === value);
}

export interface Syncable {
  isSynced: boolean;
  remoteId: string | null;
}

export interface User {
  id: string;
  phoneNumber: string;
  isActive: boolean;
  lastAuthenticated: string | null;
}

export interface TimeRecord extends Syncable {
  id: number;
  userId: string;
  type: ClockType;
  timestamp: string;
  latitude: number;
  longitude: number;
}

export interface LocationRecord extends Syncable {
  id: number;
  userId: string;
  timestamp: string;
  latitude: number;
  longitude: number;
  accuracy: number | null;
}

export interface Photo extends Syncable {
  id: string;
  userId: string;
  timestamp: string;
  latitude: number;
  longitude: number;
  filePath: string;
  syncProgress: number;
}

export interface ActivityReport extends Syncable {
  id: number;
  userId: string;
  text: string;
  timestamp: string;
  latitude: number;
  longitude: number;
}

export interface PatrolLocation {
  id: number;
  name: string;
  latitude: number;
  longitude: number;
  lastUpdated: string;
  remoteId: string | null;
}

export interface Checkpoint {
  id: number;
  locationId: number;
  name: string;
  latitude: number;
  longitude: number;
  lastUpdated: string;
  remoteId: string | null;
}

export interface CheckpointVerification extends Syncable {
  id: number;
  userId: string;
  checkpointId: number;
  timestamp: string;
  latitude: number;
  longitude: number;
}

export interface SyncQueueItem {
  id: number;
  entityType: EntityType;
  entityId: string;
  priority: number;
  retryCount: number;
  lastAttempt: string | null;
  errorMessage: string | null;
}
