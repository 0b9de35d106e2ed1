import type {
  ActivityReport,
  CheckpointVerification,
  LocationRecord,
  Photo,
  TimeRecord,
} from '../models.js';
import type { LocationBatchResponse } from '../../../shared/schema.js';

export interface CallOptions {
  signal?: AbortSignal;
}

export interface UploadOptions extends CallOptions {
  onProgress?: (percent: number) => void;
}

export interface RemoteReference {
  remoteId: string;
  name: string;
  latitude: number;
  longitude: number;
  lastUpdated: string;
}

export interface RemoteVerification {
  remoteId: string;
  status: 'Verified' | 'AlreadyVerified';
}

/**
 * Backend operations the sync engine depends on. Implementations throw the
 * shared error classes; the engine classifies on them.
 */
export interface RemoteApi {
  submitTimeRecord(record: TimeRecord, options?: CallOptions): Promise<string>;
  submitLocationBatch(records: LocationRecord[], options?: CallOptions): Promise<LocationBatchResponse>;
  uploadPhoto(photo: Photo, content: Buffer, options?: UploadOptions): Promise<string>;
  submitReport(report: ActivityReport, options?: CallOptions): Promise<string>;
  updateReport(remoteId: string, report: ActivityReport, options?: CallOptions): Promise<string>;
  deleteReport(remoteId: string, options?: CallOptions): Promise<void>;
  verifyCheckpoint(
    verification: CheckpointVerification,
    checkpointRemoteId: string,
    options?: CallOptions
  ): Promise<RemoteVerification>;
  getPatrolLocations(options?: CallOptions): Promise<RemoteReference[]>;
  getCheckpoints(locationRemoteId: string, options?: CallOptions): Promise<RemoteReference[]>;
}
