import { z } from 'zod';
import path from 'path';
import type { ApiClient } from './api-client.js';
import type {
  CallOptions,
  RemoteApi,
  RemoteReference,
  RemoteVerification,
  UploadOptions,
} from './remote-api.js';
import type {
  ActivityReport,
  CheckpointVerification,
  LocationRecord,
  Photo,
  TimeRecord,
} from '../models.js';
import type { LocationBatchResponse } from '../../../shared/schema.js';

const idResponseSchema = z.object({ id: z.string().min(1) }).passthrough();

const locationBatchResponseSchema = z.object({
  syncedIds: z.array(z.number().int()),
  failedIds: z.array(z.number().int()),
  remoteIds: z.record(z.string()),
});

const verifyResponseSchema = z.object({
  status: z.enum(['Verified', 'AlreadyVerified']),
  verification: idResponseSchema,
});

const referenceSchema = z.object({
  id: z.string(),
  name: z.string(),
  latitude: z.number(),
  longitude: z.number(),
  lastUpdated: z.string().nullable(),
}).passthrough();

const referenceListSchema = z.array(referenceSchema);

const emptySchema = z.unknown();

function toReference(item: z.infer<typeof referenceSchema>): RemoteReference {
  return {
    remoteId: item.id,
    name: item.name,
    latitude: item.latitude,
    longitude: item.longitude,
    lastUpdated: item.lastUpdated ?? new Date().toISOString(),
  };
}

/** RemoteApi over the backend's HTTP/JSON endpoints. */
export class PatrolApi implements RemoteApi {
  constructor(private readonly client: ApiClient) {}

  async submitTimeRecord(record: TimeRecord, options: CallOptions = {}): Promise<string> {
    const result = await this.client.post('/time/clock', {
      clientRef: String(record.id),
      type: record.type,
      timestamp: record.timestamp,
      latitude: record.latitude,
      longitude: record.longitude,
    }, idResponseSchema, options);
    return result.id;
  }

  submitLocationBatch(records: LocationRecord[], options: CallOptions = {}): Promise<LocationBatchResponse> {
    const body = records.map(r => ({
      id: r.id,
      clientRef: String(r.id),
      timestamp: r.timestamp,
      latitude: r.latitude,
      longitude: r.longitude,
      accuracy: r.accuracy,
    }));
    return this.client.post('/location/batch', body, locationBatchResponseSchema, options);
  }

  /** Multipart upload: a JSON "metadata" part and a binary "file" part. */
  async uploadPhoto(photo: Photo, content: Buffer, options: UploadOptions = {}): Promise<string> {
    const form = new FormData();
    form.append('metadata', JSON.stringify({
      clientRef: photo.id,
      timestamp: photo.timestamp,
      latitude: photo.latitude,
      longitude: photo.longitude,
    }));
    form.append('file', new Blob([new Uint8Array(content)], { type: 'image/jpeg' }), path.basename(photo.filePath));

    options.onProgress?.(0);
    const result = await this.client.request('POST', '/photos/upload', idResponseSchema, {
      form,
      signal: options.signal,
    });
    options.onProgress?.(100);
    return result.id;
  }

  async submitReport(report: ActivityReport, options: CallOptions = {}): Promise<string> {
    const result = await this.client.post('/reports', {
      clientRef: String(report.id),
      text: report.text,
      timestamp: report.timestamp,
      latitude: report.latitude,
      longitude: report.longitude,
    }, idResponseSchema, options);
    return result.id;
  }

  async updateReport(remoteId: string, report: ActivityReport, options: CallOptions = {}): Promise<string> {
    const result = await this.client.put(
      `/reports/${encodeURIComponent(remoteId)}`,
      { text: report.text },
      idResponseSchema,
      options
    );
    return result.id;
  }

  async deleteReport(remoteId: string, options: CallOptions = {}): Promise<void> {
    await this.client.delete(`/reports/${encodeURIComponent(remoteId)}`, emptySchema, options);
  }

  async verifyCheckpoint(
    verification: CheckpointVerification,
    checkpointRemoteId: string,
    options: CallOptions = {}
  ): Promise<RemoteVerification> {
    const result = await this.client.post('/patrol/verify', {
      checkpointId: checkpointRemoteId,
      timestamp: verification.timestamp,
      latitude: verification.latitude,
      longitude: verification.longitude,
    }, verifyResponseSchema, options);
    return { remoteId: result.verification.id, status: result.status };
  }

  async getPatrolLocations(options: CallOptions = {}): Promise<RemoteReference[]> {
    const items = await this.client.get('/patrol/locations', referenceListSchema, options);
    return items.map(toReference);
  }

  async getCheckpoints(locationRemoteId: string, options: CallOptions = {}): Promise<RemoteReference[]> {
    const items = await this.client.get(
      `/patrol/locations/${encodeURIComponent(locationRemoteId)}/checkpoints`,
      referenceListSchema,
      options
    );
    return items.map(toReference);
  }
}
